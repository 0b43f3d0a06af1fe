import type { SerialLink, SerialPortFactory } from '@hardware/serial-link';
import type { ConsoleAPI, Logger } from '@logging';
import type { FetchFn } from '@network/remote-sync';
import type { ControlLoop } from '@system/control';
import type { ControlState } from '@system/state/types';
import type { BridgeConfig, ClockFn, DelayFn } from '$types';

/**
 * Host services the bridge is wired against
 */
export interface BootDependencies {
  createPort: SerialPortFactory;
  fetch: FetchFn;
  consoleApi: ConsoleAPI;
  clock: ClockFn;
  delay: DelayFn;
}

/**
 * A fully wired bridge, ready to run
 */
export interface Bridge {
  config: BridgeConfig;
  logger: Logger;
  state: ControlState;
  link: SerialLink;
  loop: ControlLoop;
  /** Run the control loop until stop(), then release the serial port */
  run(): Promise<void>;
  stop(): void;
}
