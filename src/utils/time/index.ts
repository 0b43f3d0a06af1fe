export { nowMs, delay } from './time';
export { hasElapsed, withTimeout } from './helpers';
