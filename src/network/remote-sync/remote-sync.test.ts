/**
 * Tests for control-plane push and pull
 */

import { createFakeFetch, createRecordingLogger } from '$test-utils';
import type { FakeReply, RecordingLogger } from '$test-utils';
import type { SetpointState, TelemetrySample } from '$types/common';

import { createRemoteSync } from './remote-sync';
import type { RemoteSync, RemoteSyncConfig } from './types';

const CONFIG: RemoteSyncConfig = {
  PUSH_URL: 'http://control.test/post',
  PULL_URL: 'http://control.test/get',
  HTTP_TIMEOUT_MS: 2000
};

const SAMPLE: TelemetrySample = {
  upperPercent: 37.5,
  lowerPercent: 12,
  pumpPercent: 50,
  setpointAtPush: 85,
  timestamp: 1700000000000
};

describe('createRemoteSync', () => {
  let logger: RecordingLogger;

  function setup(replies: FakeReply[]): { sync: RemoteSync; requests: ReturnType<typeof createFakeFetch>['requests'] } {
    const fake = createFakeFetch(replies);
    logger = createRecordingLogger();
    return { sync: createRemoteSync(CONFIG, { fetch: fake.fetch, logger: logger }), requests: fake.requests };
  }

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('push', () => {
    it('should post a form-encoded body and return true on 2xx', async () => {
      const { sync, requests } = setup([{ status: 200, text: 'ok' }]);

      const ok = await sync.push(SAMPLE);

      expect(ok).toBe(true);
      expect(requests).toEqual([{
        url: 'http://control.test/post',
        method: 'POST',
        contentType: 'application/x-www-form-urlencoded',
        body: 'upper_percent=37.5&pump_percent=50&lower_percent=12'
      }]);
      expect(logger.messages(0)).toEqual(['Telemetry pushed']);
    });

    it('should return false and warn on a non-2xx status', async () => {
      const { sync } = setup([{ status: 503, text: 'busy' }]);

      const ok = await sync.push(SAMPLE);

      expect(ok).toBe(false);
      expect(logger.messages(2)).toEqual(['Telemetry push failed: HTTP 503']);
    });

    it('should return false and warn on a network error', async () => {
      const { sync } = setup([{ error: new TypeError('fetch failed') }]);

      const ok = await sync.push(SAMPLE);

      expect(ok).toBe(false);
      expect(logger.messages(2)).toEqual(['Telemetry push failed: fetch failed']);
    });

    it('should give up after the timeout', async () => {
      vi.useFakeTimers();
      const { sync } = setup([{ hang: true }]);

      const pending = sync.push(SAMPLE);
      await vi.advanceTimersByTimeAsync(2000);

      expect(await pending).toBe(false);
      expect(logger.messages(2)).toEqual(['Telemetry push timed out after 2000ms']);
    });
  });

  describe('pull', () => {
    it('should update the setpoint when the remote value differs', async () => {
      const { sync, requests } = setup([{ json: { setpoint: 90 } }]);
      const setpoint: SetpointState = { value: 85 };

      const changed = await sync.pull(setpoint);

      expect(changed).toBe(true);
      expect(setpoint.value).toBe(90);
      expect(requests[0].url).toBe('http://control.test/get');
      expect(requests[0].method).toBe('GET');
      expect(logger.messages(1)).toEqual(['New setpoint: 90%']);
    });

    it('should accept a numeric string', async () => {
      const { sync } = setup([{ json: { setpoint: '72.5' } }]);
      const setpoint: SetpointState = { value: 85 };

      expect(await sync.pull(setpoint)).toBe(true);
      expect(setpoint.value).toBe(72.5);
    });

    it('should leave the setpoint alone when unchanged', async () => {
      const { sync } = setup([{ json: { setpoint: 85 } }]);
      const setpoint: SetpointState = { value: 85 };

      expect(await sync.pull(setpoint)).toBe(false);
      expect(setpoint.value).toBe(85);
      expect(logger.entries).toEqual([]);
    });

    it('should ignore a response without a setpoint', async () => {
      const { sync } = setup([{ json: { status: 'idle' } }]);
      const setpoint: SetpointState = { value: 85 };

      expect(await sync.pull(setpoint)).toBe(false);
      expect(setpoint.value).toBe(85);
    });

    it('should warn about an invalid setpoint', async () => {
      const { sync } = setup([{ json: { setpoint: 'high' } }]);
      const setpoint: SetpointState = { value: 85 };

      expect(await sync.pull(setpoint)).toBe(false);
      expect(setpoint.value).toBe(85);
      expect(logger.messages(2)).toEqual(['Ignoring invalid setpoint from control plane: "high"']);
    });

    it('should return false on a non-2xx status', async () => {
      const { sync } = setup([{ status: 500, json: { setpoint: 90 } }]);
      const setpoint: SetpointState = { value: 85 };

      expect(await sync.pull(setpoint)).toBe(false);
      expect(setpoint.value).toBe(85);
      expect(logger.messages(2)).toEqual(['Setpoint pull failed: HTTP 500']);
    });

    it('should return false on a body that is not JSON', async () => {
      const { sync } = setup([{ text: '<html>' }]);
      const setpoint: SetpointState = { value: 85 };

      expect(await sync.pull(setpoint)).toBe(false);
      expect(logger.messages(2)).toHaveLength(1);
      expect(logger.messages(2)[0]).toMatch(/^Setpoint pull failed: /);
    });

    it('should return false when the request times out', async () => {
      vi.useFakeTimers();
      const { sync } = setup([{ hang: true }]);
      const setpoint: SetpointState = { value: 85 };

      const pending = sync.pull(setpoint);
      await vi.advanceTimersByTimeAsync(2000);

      expect(await pending).toBe(false);
      expect(logger.messages(2)).toEqual(['Setpoint pull timed out after 2000ms']);
    });
  });
});
