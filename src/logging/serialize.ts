// ============================================================================
// WIRE FORMAT - Record serialization and Loki push payloads
// ============================================================================

import type { LogRecord } from './record';

export class RecordSerializationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RecordSerializationError';
  }
}

export type SerializeResult =
  | { ok: true; line: string }
  | { ok: false; error: RecordSerializationError };

/** Stream labels: the backend groups values by this key set. */
export interface StreamLabels {
  job: string;
  type: string;
  [label: string]: string;
}

export interface PushEntry {
  timestamp: Date;
  line: string;
}

export interface PushStream {
  stream: StreamLabels;
  values: Array<[string, string]>;
}

export interface PushPayload {
  streams: PushStream[];
}

/** JSON shape of a record as pushed to the backend. */
export interface SerializedRecord {
  message?: string;
  error?: string;
  type?: string;
  level: string;
  additional_data?: Record<string, unknown>;
  timestamp: string;
}

export function toSerializedRecord(record: LogRecord): SerializedRecord {
  // Key order is part of the format; empty values are omitted
  return {
    ...(record.message ? { message: record.message } : {}),
    ...(record.error ? { error: record.error } : {}),
    ...(record.type ? { type: record.type } : {}),
    level: record.level,
    ...(record.fields && Object.keys(record.fields).length > 0
      ? { additional_data: { ...record.fields } }
      : {}),
    timestamp: record.timestamp.toISOString(),
  };
}

/**
 * Serialize a record into the line pushed to the backend.
 *
 * Field values that JSON cannot represent (BigInt, circular structures,
 * throwing `toJSON`) produce an error result instead of a line.
 */
export function serializeRecord(record: LogRecord): SerializeResult {
  try {
    return { ok: true, line: JSON.stringify(toSerializedRecord(record)) };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      error: new RecordSerializationError(
        `Error serializing log record (${record.type}): ${reason}`,
        { cause: err },
      ),
    };
  }
}

/** Unix epoch in nanoseconds, as the decimal string the push API expects. */
export function toUnixNanos(timestamp: Date): string {
  return (BigInt(timestamp.getTime()) * 1_000_000n).toString();
}

export function buildPushPayload(labels: StreamLabels, entry: PushEntry): PushPayload {
  return {
    streams: [
      {
        stream: { ...labels },
        values: [[toUnixNanos(entry.timestamp), entry.line]],
      },
    ],
  };
}
