import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ActionParams, ActionQuery } from '../schemas/actions';

export interface ActionEvent {
  timestamp: string;
  customerId: string;
  eventType: string;
  mac: string;
  ip: string;
  model: string;
  firmware: string;
  activeUrl: string;
  activeUser: string;
  activeHost: string;
  local: string;
  remote: string;
  displayLocal: string;
  displayRemote: string;
  callId: string;
  callerId: string;
  calledNumber: string;
  additionalInfo: Record<string, string>;
}

/** Query keys mapped onto dedicated ActionEvent properties */
export const STANDARD_QUERY_FIELDS = [
  'mac',
  'ip',
  'model',
  'firmware',
  'active_url',
  'active_user',
  'active_host',
  'local',
  'remote',
  'display_local',
  'display_remote',
  'call_id',
  'callerID',
  'calledNumber',
] as const;

const standardFields = new Set<string>(STANDARD_QUERY_FIELDS);

export function isStandardField(field: string): boolean {
  return standardFields.has(field);
}

function firstValue(value: string | string[] | undefined): string {
  if (value === undefined) return '';
  return Array.isArray(value) ? (value[0] ?? '') : value;
}

export function buildActionEvent(
  params: ActionParams,
  query: ActionQuery,
  now: Date = new Date(),
): ActionEvent {
  const q = (key: string) => firstValue(query[key]);

  const additionalInfo: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    if (!isStandardField(key)) {
      additionalInfo[key] = firstValue(value);
    }
  }

  return {
    timestamp: now.toISOString(),
    customerId: params.customerId,
    eventType: params.eventType,
    mac: q('mac'),
    ip: q('ip'),
    model: q('model'),
    firmware: q('firmware'),
    activeUrl: q('active_url'),
    activeUser: q('active_user'),
    activeHost: q('active_host'),
    local: q('local'),
    remote: q('remote'),
    displayLocal: q('display_local'),
    displayRemote: q('display_remote'),
    callId: q('call_id'),
    callerId: q('callerID'),
    calledNumber: q('calledNumber'),
    additionalInfo,
  };
}

/**
 * Flatten an event into log fields; additional query keys get an `extra_` prefix.
 */
export function toLogFields(event: ActionEvent): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    timestamp: event.timestamp,
    customer_id: event.customerId,
    event_type: event.eventType,
    mac: event.mac,
    ip: event.ip,
    model: event.model,
    firmware: event.firmware,
    active_url: event.activeUrl,
    active_user: event.activeUser,
    active_host: event.activeHost,
    local: event.local,
    remote: event.remote,
    display_local: event.displayLocal,
    display_remote: event.displayRemote,
    call_id: event.callId,
    caller_id: event.callerId,
    called_number: event.calledNumber,
  };

  for (const [key, value] of Object.entries(event.additionalInfo)) {
    fields[`extra_${key}`] = value;
  }

  return fields;
}

export interface ActionEventStore {
  save(event: ActionEvent): Promise<void>;
}

/**
 * Appends each event as one JSON line to `<dataDir>/<customerId>_events.json`.
 */
export class FileActionEventStore implements ActionEventStore {
  constructor(private readonly dataDir: string) {}

  filePath(customerId: string): string {
    return join(this.dataDir, `${customerId}_events.json`);
  }

  async save(event: ActionEvent): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    await appendFile(this.filePath(event.customerId), `${JSON.stringify(event)}\n`, {
      mode: 0o644,
    });
  }
}
