import type { Logger } from 'pino';
import { Severity, type LogRecord } from './record';

/**
 * Write a record to the local structured logger.
 *
 * Record fields are merged last, so a field named `type` or `timestamp`
 * overrides the record's own binding of that name.
 */
export function emitLocal(logger: Logger, record: LogRecord): void {
  const bindings: Record<string, unknown> = {
    type: record.type,
    severity: record.level,
    timestamp: record.timestamp.toISOString(),
    ...(record.error ? { error: record.error } : {}),
    ...record.fields,
  };

  switch (record.level) {
    case Severity.ERROR:
      logger.error(bindings, record.message);
      break;
    case Severity.WARN:
      logger.warn(bindings, record.message);
      break;
    case Severity.DEBUG:
      logger.debug(bindings, record.message);
      break;
    default:
      logger.info(bindings, record.message);
  }
}
