// ============================================================================
// LOG RECORD - One timestamped event ready for emission
// ============================================================================

import type { ReadonlyTemplateRegistry } from './templates';

export const Severity = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

export type LogFields = Record<string, unknown>;

export interface LogRecordInit {
  message: string;
  type: string;
  level: Severity;
  fields?: LogFields;
  timestamp?: Date;
}

/**
 * A fully formed log event.
 *
 * `message`, `type`, `level` and `timestamp` are fixed at construction; fields
 * can still be appended. Not safe to mutate from two producers at once.
 */
export class LogRecord {
  readonly message: string;
  readonly type: string;
  readonly level: Severity;
  readonly timestamp: Date;
  private _fields?: LogFields;
  private _error?: string;

  constructor(init: LogRecordInit) {
    this.message = init.message;
    this.type = init.type;
    this.level = init.level;
    this.timestamp = init.timestamp ?? new Date();
    this._fields = init.fields;
  }

  get fields(): Readonly<LogFields> | undefined {
    return this._fields;
  }

  get error(): string | undefined {
    return this._error;
  }

  addField(key: string, value: unknown): this {
    if (!this._fields) {
      this._fields = {};
    }
    this._fields[key] = value;
    return this;
  }

  attachError(err: unknown): this {
    this._error = err instanceof Error ? err.message : String(err);
    return this;
  }
}

/**
 * Build a record from a template name and positional arguments.
 *
 * The classification is upper-cased and the fields map is shallow-copied, so
 * the caller may keep reusing its own object.
 *
 * @example
 * ```typescript
 * const record = buildLog(templates, 'phone_action', 'ActionRecorded', Severity.INFO,
 *   { customer_id: 'c-1' }, 'hangup', 'c-1');
 * record.type;    // 'PHONE_ACTION'
 * record.message; // 'Action event (hangup) recorded for customer c-1'
 * ```
 */
export function buildLog(
  templates: ReadonlyTemplateRegistry,
  type: string,
  templateName: string,
  level: Severity,
  fields?: LogFields | null,
  ...args: unknown[]
): LogRecord {
  return new LogRecord({
    message: templates.resolve(templateName, ...args),
    type: type.toUpperCase(),
    level,
    fields: fields ? { ...fields } : undefined,
    timestamp: new Date(),
  });
}
