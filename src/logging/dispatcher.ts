// ============================================================================
// LOG DISPATCHER - Single-consumer delivery pipeline
// ============================================================================

import type { Logger } from 'pino';
import { RendezvousChannel } from './channel';
import { emitLocal } from './console';
import type { LogRecord } from './record';
import type { RemoteSink } from './remote-sink';
import { serializeRecord, type StreamLabels } from './serialize';

export type DispatcherState = 'running' | 'draining' | 'closed';

/**
 * What the worker did with a record:
 * - `sent`: pushed and acknowledged by the backend
 * - `skipped`: no sink configured, or the sink is disabled
 * - `unserializable`: dropped because it could not be serialized
 * - `failed`: the push was rejected; the record is dropped
 */
export type DeliveryOutcome = 'sent' | 'skipped' | 'unserializable' | 'failed';

export interface LogDispatcherConfig {
  /** Local structured logger; records are emitted here before hand-off */
  logger: Logger;

  /** Remote sink; without one records are only emitted locally */
  sink?: RemoteSink;

  /** Called by the worker after each record, whatever the outcome */
  onProcessed?: (record: LogRecord, outcome: DeliveryOutcome) => void;
}

export class DispatcherClosedError extends Error {
  constructor(public readonly state: DispatcherState) {
    super(`Cannot enqueue log record: dispatcher is ${state}`);
    this.name = 'DispatcherClosedError';
  }
}

/**
 * Moves records from any number of producers to one background worker.
 *
 * `enqueue` writes the record to the console on the caller's side, then waits
 * until the worker takes it. While the worker is busy pushing, the next
 * `enqueue` stays pending: a slow backend slows producers down instead of
 * growing a queue.
 *
 * @example
 * ```typescript
 * const dispatcher = new LogDispatcher({ logger, sink });
 *
 * await dispatcher.enqueue(record); // resolves once the worker has it
 *
 * // At shutdown: drains every record enqueued before this call
 * await dispatcher.shutdown();
 * ```
 */
export class LogDispatcher {
  private readonly channel = new RendezvousChannel<LogRecord>();
  private readonly logger: Logger;
  private readonly sink?: RemoteSink;
  private readonly onProcessed?: (record: LogRecord, outcome: DeliveryOutcome) => void;
  private readonly worker: Promise<void>;
  private _state: DispatcherState = 'running';

  constructor(config: LogDispatcherConfig) {
    this.logger = config.logger;
    this.sink = config.sink;
    this.onProcessed = config.onProcessed;

    this.worker = this.run();
  }

  get state(): DispatcherState {
    return this._state;
  }

  /**
   * Emit the record locally, then hand it to the worker.
   *
   * Rejects with {@link DispatcherClosedError} once shutdown has begun; in
   * that case nothing is emitted.
   */
  async enqueue(record: LogRecord): Promise<void> {
    if (this._state !== 'running') {
      throw new DispatcherClosedError(this._state);
    }

    emitLocal(this.logger, record);
    await this.channel.send(record);
  }

  /**
   * Stop accepting records and wait for the worker to drain the ones already
   * enqueued. Safe to call more than once.
   */
  async shutdown(): Promise<void> {
    if (this._state === 'running') {
      this._state = 'draining';
      this.logger.debug(
        { pendingSends: this.channel.pendingSends },
        'Log dispatcher draining',
      );
      this.channel.close();
    }
    await this.worker;
  }

  // ==========================================================================
  // Internal - Worker
  // ==========================================================================

  private async run(): Promise<void> {
    for await (const record of this.channel) {
      const outcome = await this.deliver(record);
      this.fireHook(record, outcome);
    }
    this._state = 'closed';
    this.logger.debug('Log dispatcher closed');
  }

  private async deliver(record: LogRecord): Promise<DeliveryOutcome> {
    if (!this.sink?.isActive) {
      return 'skipped';
    }

    const serialized = serializeRecord(record);
    if (!serialized.ok) {
      this.logger.error({ err: serialized.error, type: record.type }, 'Failed to serialize log record');
      return 'unserializable';
    }

    const sink = this.sink;
    const labels: StreamLabels = { job: sink.job, type: record.type };
    try {
      return await sink.push(labels, {
        timestamp: record.timestamp,
        line: serialized.line,
      });
    } catch (err) {
      this.logger.error({ err, type: record.type }, 'Failed to send log to backend');
      return 'failed';
    }
  }

  /** Hook errors are logged, not rethrown */
  private fireHook(record: LogRecord, outcome: DeliveryOutcome): void {
    if (!this.onProcessed) return;
    try {
      this.onProcessed(record, outcome);
    } catch (err) {
      this.logger.warn({ err }, 'onProcessed hook threw');
    }
  }
}
