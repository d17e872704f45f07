import { z } from 'zod';

const pathSegment = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9_-]+$/, 'Only letters, digits, "_" and "-" are allowed');

export const actionParamsSchema = z.object({
  customerId: pathSegment,
  eventType: pathSegment,
});

// Repeated query keys arrive as arrays
export const actionQuerySchema = z.record(
  z.string(),
  z.union([z.string(), z.array(z.string())]),
);

export const actionRecordedResponseSchema = z.object({
  message: z.string(),
});

export const errorResponseSchema = z.object({
  error: z.string(),
  message: z.string(),
});

export type ActionParams = z.infer<typeof actionParamsSchema>;
export type ActionQuery = z.infer<typeof actionQuerySchema>;
