import { describe, it, expect, vi } from 'vitest';
import { RemotePushError, RemoteSink } from '../../src/logging/remote-sink';
import { FIXED_TIMESTAMP } from '../fixtures/records';
import {
  createHangingFetch,
  createMockFetch,
  createStalledBodyFetch,
  requestBody,
} from '../helpers/fetch';

const PUSH_URL = 'http://loki.test:3100/loki/api/v1/push';
const labels = { job: 'action-event-logger', type: 'PHONE_ACTION' };
const entry = { timestamp: FIXED_TIMESTAMP, line: '{"message":"hello"}' };

describe('RemoteSink', () => {
  describe('disabled', () => {
    it.each([
      ['enabled=false', { enabled: false, pushUrl: PUSH_URL }],
      ['empty URL', { enabled: true, pushUrl: '' }],
      ['no URL', { enabled: true }],
    ])('skips without network calls when %s', async (_name, config) => {
      const mockFetch = createMockFetch([{ status: 500 }]);
      const sink = new RemoteSink({ ...config, fetch: mockFetch });

      await expect(sink.push(labels, entry)).resolves.toBe('skipped');
      expect(mockFetch).not.toHaveBeenCalled();
      expect(sink.isActive).toBe(false);
    });
  });

  describe('push()', () => {
    it('POSTs the stream payload as JSON', async () => {
      const mockFetch = createMockFetch([{ status: 204 }]);
      const sink = new RemoteSink({
        enabled: true,
        pushUrl: PUSH_URL,
        job: 'action-event-logger',
        fetch: mockFetch,
      });

      await expect(sink.push(labels, entry)).resolves.toBe('sent');
      expect(mockFetch).toHaveBeenCalledTimes(1);

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe(PUSH_URL);
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(requestBody(init)).toEqual({
        streams: [
          {
            stream: { job: 'action-event-logger', type: 'PHONE_ACTION' },
            values: [['1709634030456000000', '{"message":"hello"}']],
          },
        ],
      });
    });

    it('accepts 200 as success', async () => {
      const sink = new RemoteSink({
        enabled: true,
        pushUrl: PUSH_URL,
        fetch: createMockFetch([{ status: 200, body: '{}' }]),
      });

      await expect(sink.push(labels, entry)).resolves.toBe('sent');
    });

    it('sends basic auth when username and password are both set', async () => {
      const mockFetch = createMockFetch([{ status: 204 }]);
      const sink = new RemoteSink({
        enabled: true,
        pushUrl: PUSH_URL,
        username: 'test-user',
        password: 'test-secret',
        fetch: mockFetch,
      });

      await sink.push(labels, entry);

      const [, init] = mockFetch.mock.calls[0];
      expect(init?.headers).toEqual({
        'Content-Type': 'application/json',
        Authorization: `Basic ${Buffer.from('test-user:test-secret').toString('base64')}`,
      });
    });

    it('omits auth when only the username is set', async () => {
      const mockFetch = createMockFetch([{ status: 204 }]);
      const sink = new RemoteSink({
        enabled: true,
        pushUrl: PUSH_URL,
        username: 'test-user',
        fetch: mockFetch,
      });

      await sink.push(labels, entry);

      const [, init] = mockFetch.mock.calls[0];
      expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
    });

    it('rejects on any other status with the status code', async () => {
      const sink = new RemoteSink({
        enabled: true,
        pushUrl: PUSH_URL,
        fetch: createMockFetch([{ status: 400, body: 'entry out of order' }]),
      });

      const error = await sink.push(labels, entry).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RemotePushError);
      if (error instanceof RemotePushError) {
        expect(error.statusCode).toBe(400);
        expect(error.message).toBe('Unexpected response from backend: 400 - entry out of order');
      }
    });

    it('rejects with the transport error as cause when the endpoint is unreachable', async () => {
      const transportError = new TypeError('fetch failed');
      const mockFetch = vi.fn<typeof fetch>(async () => {
        throw transportError;
      });
      const sink = new RemoteSink({ enabled: true, pushUrl: PUSH_URL, fetch: mockFetch });

      const error = await sink.push(labels, entry).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RemotePushError);
      if (error instanceof RemotePushError) {
        expect(error.message).toBe('Failed to send request to backend: fetch failed');
        expect(error.statusCode).toBeUndefined();
        expect(error.cause).toBe(transportError);
      }
    });

    it('times out a hung push', async () => {
      const sink = new RemoteSink({
        enabled: true,
        pushUrl: PUSH_URL,
        timeoutMs: 20,
        fetch: createHangingFetch(),
      });

      await expect(sink.push(labels, entry)).rejects.toThrow(
        `Push to ${PUSH_URL} timed out after 20ms`,
      );
    });

    it('times out while reading a stalled error body', async () => {
      const sink = new RemoteSink({
        enabled: true,
        pushUrl: PUSH_URL,
        timeoutMs: 20,
        fetch: createStalledBodyFetch(500),
      });

      await expect(sink.push(labels, entry)).rejects.toThrow(
        `Push to ${PUSH_URL} timed out after 20ms`,
      );
    });

    it('aborts when the caller signal aborts', async () => {
      const sink = new RemoteSink({
        enabled: true,
        pushUrl: PUSH_URL,
        timeoutMs: 5_000,
        fetch: createHangingFetch(),
      });
      const controller = new AbortController();

      const pushed = sink.push(labels, entry, controller.signal);
      controller.abort();

      await expect(pushed).rejects.toThrow(
        'Failed to send request to backend: This operation was aborted',
      );
    });
  });

  it('exposes enabled and job', () => {
    const sink = new RemoteSink({ enabled: true, pushUrl: PUSH_URL, job: 'jobname' });
    expect(sink.enabled).toBe(true);
    expect(sink.job).toBe('jobname');
    expect(sink.isActive).toBe(true);
    expect(new RemoteSink({ enabled: false }).job).toBe('');
  });
});
