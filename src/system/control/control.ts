/**
 * Control loop implementation
 *
 * Single async flow: every step is awaited in order, so reads always
 * precede the push of the same tick and reconnection runs last.
 */

import { errorMessage } from '$types/errors';
import { resetTimers } from '@system/state/state';

import { processPull, processPush, processRead, processReconnect } from './helpers';
import type { ControlLoop, ControlLoopDependencies, Controller } from './types';

/**
 * Create the control loop
 * @param deps - Collaborators, state, clock and delay
 * @returns Control loop with start/tick/run/stop
 */
export function createControlLoop(deps: ControlLoopDependencies): ControlLoop {
  const abort = new AbortController();
  const ctx: Controller = { ...deps, signal: abort.signal };
  const state = deps.state;
  const logger = deps.logger;
  let running = false;

  async function start(): Promise<boolean> {
    const connected = await deps.link.connect(state.setpoint.value, abort.signal);
    resetTimers(state, deps.clock());
    return connected;
  }

  async function tick(): Promise<void> {
    try {
      processRead(ctx);
      await processPush(ctx);
      await processPull(ctx);
      await processReconnect(ctx);
      state.consecutiveErrors = 0;
    } catch (e) {
      state.consecutiveErrors++;
      logger.critical('Control loop crashed: ' + errorMessage(e));
      if (state.consecutiveErrors === deps.config.MAX_CONSECUTIVE_ERRORS) {
        logger.critical('Control loop failed ' + state.consecutiveErrors + ' ticks in a row');
      }
    }
  }

  async function run(): Promise<void> {
    running = true;
    try {
      await start();
      while (!abort.signal.aborted) {
        await tick();
        await deps.delay(deps.config.LOOP_IDLE_MS, abort.signal);
      }
    } finally {
      running = false;
    }
  }

  function stop(): void {
    abort.abort();
  }

  return {
    start: start,
    tick: tick,
    run: run,
    stop: stop,
    isRunning: function() { return running; }
  };
}
