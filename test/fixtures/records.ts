import { LogRecord, Severity, type LogRecordInit } from '../../src/logging';

export const FIXED_TIMESTAMP = new Date('2024-03-05T10:20:30.456Z');

export function createRecordFixture(overrides?: Partial<LogRecordInit>): LogRecord {
  return new LogRecord({
    message: 'Action event (hangup) recorded for customer cust-1',
    type: 'PHONE_ACTION',
    level: Severity.INFO,
    fields: { customer_id: 'cust-1', event_type: 'hangup' },
    timestamp: FIXED_TIMESTAMP,
    ...overrides,
  });
}
