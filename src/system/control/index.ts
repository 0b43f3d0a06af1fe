export { createControlLoop } from './control';
export { processPull, processPush, processRead, processReconnect } from './helpers';
export type { ControlLoop, ControlLoopConfig, ControlLoopDependencies, Controller } from './types';
