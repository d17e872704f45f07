import { vi } from 'vitest';
import { buildApp } from '../../src/app';
import type { DeliveryOutcome } from '../../src/logging/dispatcher';
import { createLogPipeline } from '../../src/logging/pipeline';
import type { LogRecord } from '../../src/logging/record';
import type { ActionEvent, ActionEventStore } from '../../src/services/action-event.service';
import { createCaptureLogger } from './logger';

export interface TestAppOptions {
  saveToFile?: boolean;
  store?: ActionEventStore;
  /** Route request logs into the capture logger too */
  requestLogs?: boolean;
}

export function createMockStore() {
  const saved: ActionEvent[] = [];
  const save = vi.fn(async (event: ActionEvent) => {
    saved.push(event);
  });
  return { saved, save };
}

/**
 * App wired to a local-only pipeline whose records land in a capture logger
 */
export async function createTestApp(options: TestAppOptions = {}) {
  const capture = createCaptureLogger();
  const processed: Array<{ record: LogRecord; outcome: DeliveryOutcome }> = [];
  const pipeline = createLogPipeline({
    logger: capture.logger,
    onProcessed: (record, outcome) => processed.push({ record, outcome }),
  });
  const store = options.store ?? createMockStore();

  const app = buildApp({
    pipeline,
    store,
    saveToFile: options.saveToFile ?? true,
    logger: options.requestLogs ? capture.logger : undefined,
  });
  await app.ready();

  return { app, pipeline, capture, processed, store };
}
