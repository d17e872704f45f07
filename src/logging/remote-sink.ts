// ============================================================================
// REMOTE SINK - Loki push API client
// ============================================================================

import { buildPushPayload, type PushEntry, type StreamLabels } from './serialize';

export interface RemoteSinkConfig {
  /** Master switch; a disabled sink never touches the network */
  enabled: boolean;

  /** Full push endpoint, e.g. `http://loki:3100/loki/api/v1/push` */
  pushUrl?: string;

  /** Basic auth is sent only when both username and password are set */
  username?: string;
  password?: string;

  /** Value of the `job` stream label */
  job?: string;

  /** Upper bound for one push, in ms (default: 10000) */
  timeoutMs?: number;

  /** Custom fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

/**
 * `sent` when the backend acknowledged the push, `skipped` when the sink is
 * disabled or has no URL.
 */
export type PushResult = 'sent' | 'skipped';

export class RemotePushError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'RemotePushError';
  }
}

const SUCCESS_STATUSES = new Set([200, 204]);

/**
 * Pushes one record at a time to a Loki-compatible backend.
 *
 * Stateless per call, so one instance can be shared. No retries: a failed
 * push rejects with {@link RemotePushError} and the caller decides what to
 * do with it.
 *
 * @example
 * ```typescript
 * const sink = new RemoteSink({
 *   enabled: true,
 *   pushUrl: 'http://localhost:3100/loki/api/v1/push',
 *   job: 'action-event-logger',
 * });
 *
 * await sink.push(
 *   { job: sink.job, type: 'PHONE_ACTION' },
 *   { timestamp: new Date(), line: '{"message":"hello"}' },
 * );
 * ```
 */
export class RemoteSink {
  private readonly _enabled: boolean;
  private readonly pushUrl?: string;
  private readonly authorization?: string;
  private readonly _job: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: RemoteSinkConfig) {
    this._enabled = config.enabled;
    this.pushUrl = config.pushUrl || undefined;
    this._job = config.job ?? '';
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.fetchFn = config.fetch ?? fetch;

    if (config.username && config.password) {
      const credentials = Buffer.from(`${config.username}:${config.password}`).toString('base64');
      this.authorization = `Basic ${credentials}`;
    }
  }

  get enabled(): boolean {
    return this._enabled;
  }

  get job(): string {
    return this._job;
  }

  /** True when a push would actually reach the network */
  get isActive(): boolean {
    return this._enabled && this.pushUrl !== undefined;
  }

  async push(labels: StreamLabels, entry: PushEntry, signal?: AbortSignal): Promise<PushResult> {
    if (!this._enabled || !this.pushUrl) {
      return 'skipped';
    }

    const body = JSON.stringify(buildPushPayload(labels, entry));
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.authorization) {
      headers['Authorization'] = this.authorization;
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) controller.abort();

    try {
      const response = await this.fetchFn(this.pushUrl, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });

      // Body reads stay under the same timeout as the request
      if (!SUCCESS_STATUSES.has(response.status)) {
        const errorBody = await response.text();
        throw new RemotePushError(
          `Unexpected response from backend: ${response.status}${errorBody ? ` - ${errorBody}` : ''}`,
          response.status,
        );
      }
      await response.body?.cancel();

      return 'sent';
    } catch (error) {
      if (error instanceof RemotePushError) {
        throw error;
      }
      if (timedOut) {
        throw new RemotePushError(
          `Push to ${this.pushUrl} timed out after ${this.timeoutMs}ms`,
          undefined,
          { cause: error },
        );
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new RemotePushError(`Failed to send request to backend: ${reason}`, undefined, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
