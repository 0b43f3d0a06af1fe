/**
 * Control-plane synchronisation over HTTP
 *
 * push: POST the latest percentages as a form body.
 * pull: GET the remote setpoint as JSON.
 *
 * Every request is bounded by HTTP_TIMEOUT_MS. Delivery is best effort:
 * a failed push is not retried, the next tick sends fresher data.
 */

import { RemoteSyncError, errorMessage } from '$types/errors';
import type { SetpointState, TelemetrySample } from '$types/common';

import { buildPushBody, readSetpointField } from './helpers';
import type { RemoteSync, RemoteSyncConfig, RemoteSyncDependencies } from './types';

/**
 * Create the remote sync client
 * @param config - Endpoints and timeout
 * @param deps - fetch implementation and logger
 * @returns Remote sync instance
 */
export function createRemoteSync(config: RemoteSyncConfig, deps: RemoteSyncDependencies): RemoteSync {
  const logger = deps.logger;
  const timeout = config.HTTP_TIMEOUT_MS;

  async function request<T>(
    url: string,
    init: RequestInit,
    label: string,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(function() { controller.abort(); }, timeout);

    try {
      const response = await deps.fetch(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        throw new RemoteSyncError(label + ' failed: HTTP ' + response.status, response.status);
      }
      return await read(response);
    } catch (err) {
      if (err instanceof RemoteSyncError) {
        throw err;
      }
      if (controller.signal.aborted) {
        throw new RemoteSyncError(label + ' timed out after ' + timeout + 'ms');
      }
      throw new RemoteSyncError(label + ' failed: ' + errorMessage(err));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async function push(sample: TelemetrySample): Promise<boolean> {
    try {
      await request(
        config.PUSH_URL,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: buildPushBody(sample).toString()
        },
        'Telemetry push',
        async function(response) { await response.text(); }
      );
    } catch (err) {
      logger.warning(errorMessage(err));
      return false;
    }

    logger.debug('Telemetry pushed');
    return true;
  }

  async function pull(setpoint: SetpointState): Promise<boolean> {
    let body: unknown;
    try {
      body = await request<unknown>(
        config.PULL_URL,
        { method: 'GET', headers: { Accept: 'application/json' } },
        'Setpoint pull',
        function(response) { return response.json(); }
      );
    } catch (err) {
      logger.warning(errorMessage(err));
      return false;
    }

    const field = readSetpointField(body);
    if (field.kind === 'missing') {
      return false;
    }
    if (field.kind === 'invalid') {
      logger.warning('Ignoring invalid setpoint from control plane: ' + JSON.stringify(field.raw));
      return false;
    }
    if (field.value === setpoint.value) {
      return false;
    }

    setpoint.value = field.value;
    logger.info('New setpoint: ' + field.value + '%');
    return true;
  }

  return {
    push: push,
    pull: pull
  };
}
