// ============================================================================
// LOG PIPELINE - Templates + dispatcher, built once at startup
// ============================================================================

import type { Logger } from 'pino';
import { LogDispatcher, type DeliveryOutcome, type DispatcherState } from './dispatcher';
import { buildLog, type LogFields, type LogRecord, type Severity } from './record';
import { RemoteSink, type RemoteSinkConfig } from './remote-sink';
import {
  TemplateRegistry,
  loadDefaultTemplates,
  type ReadonlyTemplateRegistry,
} from './templates';

/**
 * The producer-facing surface: build a record, enqueue it, shut down.
 *
 * Created once and passed to whoever produces events, e.g. route plugins.
 */
export class LogPipeline {
  constructor(
    readonly templates: ReadonlyTemplateRegistry,
    private readonly dispatcher: LogDispatcher,
  ) {}

  get state(): DispatcherState {
    return this.dispatcher.state;
  }

  buildLog(
    type: string,
    templateName: string,
    level: Severity,
    fields?: LogFields | null,
    ...args: unknown[]
  ): LogRecord {
    return buildLog(this.templates, type, templateName, level, fields, ...args);
  }

  enqueue(record: LogRecord): Promise<void> {
    return this.dispatcher.enqueue(record);
  }

  shutdown(): Promise<void> {
    return this.dispatcher.shutdown();
  }
}

export interface CreateLogPipelineOptions {
  /** Logger the dispatcher emits records on */
  logger: Logger;

  /** Remote sink settings; omit to keep records local */
  loki?: Omit<RemoteSinkConfig, 'fetch'>;

  /** Extra templates registered after the defaults */
  templates?: Record<string, string>;

  /** Custom fetch for the remote sink */
  fetch?: typeof fetch;

  onProcessed?: (record: LogRecord, outcome: DeliveryOutcome) => void;
}

/**
 * Register templates, freeze them and start the dispatcher worker.
 *
 * The registry is frozen before the worker starts, so nothing can write to it
 * while records are being built concurrently.
 */
export function createLogPipeline(options: CreateLogPipelineOptions): LogPipeline {
  const registry = loadDefaultTemplates(new TemplateRegistry());
  if (options.templates) {
    registry.addAll(options.templates);
  }
  const templates = registry.freeze();

  const sink = options.loki
    ? new RemoteSink({ ...options.loki, fetch: options.fetch })
    : undefined;

  const dispatcher = new LogDispatcher({
    logger: options.logger,
    sink,
    onProcessed: options.onProcessed,
  });

  return new LogPipeline(templates, dispatcher);
}
