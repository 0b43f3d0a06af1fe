export { createSerialLink } from './serial-link';
export { formatSetpoint, formatSetpointFrame } from './helpers';
export { CONNECTION_STATES } from './types';
export type {
  ConnectionState,
  SerialLink,
  SerialLinkConfig,
  SerialLinkDependencies,
  SerialPortFactory,
  SerialPortHandle,
  SerialPortListeners,
  SerialPortOptions
} from './types';
