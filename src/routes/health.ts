import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';
import type { LogPipeline } from '../logging';

export interface HealthRouteOptions {
  pipeline: LogPipeline;
}

export async function healthRoutes(app: FastifyInstance, opts: HealthRouteOptions) {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get(
    '/healthcheck',
    {
      schema: {
        description: 'Returns service health and log dispatcher state',
        response: {
          200: z.object({
            status: z.literal('ok'),
            dispatcher: z.enum(['running', 'draining', 'closed']),
          }),
        },
      },
    },
    async () => ({ status: 'ok' as const, dispatcher: opts.pipeline.state }),
  );
}
