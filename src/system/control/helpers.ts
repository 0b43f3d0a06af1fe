/**
 * Control loop steps
 *
 * Each step checks its own interval and is a no-op when not due.
 */

import { ConnectionLostError } from '$types/errors';
import { fmtPercent } from '@logging';
import { hasElapsed } from '@utils/time';

import type { Controller } from './types';

/**
 * Drain and apply device input
 * @returns Number of readings applied
 */
export function processRead(ctx: Controller): number {
  const state = ctx.state;
  const t = ctx.clock();

  if (!ctx.link.isConnected() || !ctx.link.hasPendingInput()) {
    return 0;
  }
  if (!hasElapsed(t, state.lastReadTime, ctx.config.SERIAL_READ_INTERVAL_MS)) {
    return 0;
  }
  state.lastReadTime = t;

  let readings = 0;
  for (const result of ctx.link.readAvailable()) {
    if (result.kind === 'reading') {
      state.raw = result.reading;
      readings++;
    } else if (result.kind === 'handshake') {
      ctx.logger.info('Device ready');
    }
  }
  return readings;
}

/**
 * Convert, record and push the current telemetry
 * @returns True when a push tick ran
 */
export async function processPush(ctx: Controller): Promise<boolean> {
  const state = ctx.state;
  const t = ctx.clock();

  if (!hasElapsed(t, state.lastPushTime, ctx.config.PUSH_INTERVAL_MS)) {
    return false;
  }
  state.lastPushTime = t;

  const sample = ctx.converter.toSample(state.raw, state.setpoint.value, t);
  ctx.audit.append(sample);
  ctx.logger.info(
    'PV: ' + fmtPercent(sample.upperPercent) +
    ', CO: ' + fmtPercent(sample.pumpPercent) +
    ', Setpoint: ' + fmtPercent(sample.setpointAtPush)
  );
  await ctx.remote.push(sample);
  return true;
}

/**
 * Pull the remote setpoint and relay a change to the device
 * @returns True when the setpoint changed
 */
export async function processPull(ctx: Controller): Promise<boolean> {
  const state = ctx.state;
  const t = ctx.clock();

  if (!hasElapsed(t, state.lastPullTime, ctx.config.PULL_INTERVAL_MS)) {
    return false;
  }
  state.lastPullTime = t;

  const changed = await ctx.remote.pull(state.setpoint);
  // While disconnected the new value goes out with the next connect
  if (!changed || !ctx.link.isConnected()) {
    return changed;
  }

  try {
    await ctx.link.write(state.setpoint.value);
  } catch (err) {
    if (!(err instanceof ConnectionLostError)) {
      throw err;
    }
    ctx.logger.warning('Setpoint not delivered: ' + err.message);
  }
  return changed;
}

/**
 * Re-establish the serial connection when it is down
 * @returns True when a reconnect was attempted
 */
export async function processReconnect(ctx: Controller): Promise<boolean> {
  if (ctx.link.isConnected() || ctx.signal.aborted) {
    return false;
  }
  ctx.logger.info('Serial link down, reconnecting');
  await ctx.link.connect(ctx.state.setpoint.value, ctx.signal);
  return true;
}
