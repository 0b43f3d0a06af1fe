import type { BridgeUserConfig, BridgeAppConstants, BridgeConfig, BridgeConfigOverrides } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything an operator might reasonably tune for wiring,
//   timing, calibration and observability.
//   Override per host with BRIDGE_* environment variables
//   (see boot/env.ts) or CLI flags (see boot/main.ts).
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<BridgeUserConfig> = {
  // SERIAL_PORT
  //   Role: Device path of the rig's USB serial adapter.
  //   Critical: Non-empty string.
  //   Recommended: A stable /dev/serial/by-id/... path on Linux; /dev/ttyUSB0 for a single adapter.
  SERIAL_PORT: '/dev/ttyUSB0',

  // BAUD_RATE
  //   Role: Line speed; must match the firmware's Serial.begin().
  //   Critical: Positive integer (error otherwise).
  //   Recommended: 9600.
  BAUD_RATE: 9600,

  // SERIAL_IO_TIMEOUT_MS
  //   Role: Upper bound for a single open, flush or write on the port.
  //   Critical: 100–30000 ms.
  //   Recommended: 1000 ms.
  SERIAL_IO_TIMEOUT_MS: 1000,

  // SERIAL_SETTLE_MS
  //   Role: Wait after opening the port before the first frame (the board resets on open).
  //   Critical: 0–10000 ms.
  //   Recommended: 2000 ms for Uno-class boards.
  SERIAL_SETTLE_MS: 2000,

  // RECONNECT_DELAY_MS
  //   Role: Fixed delay between connection attempts while the device is absent.
  //   Critical: 100–600000 ms.
  //   Recommended: 5000 ms.
  RECONNECT_DELAY_MS: 5000,

  // SERIAL_READ_INTERVAL_MS
  //   Role: Minimum time between two drains of the serial input buffer.
  //   Critical: ≥0 ms; every drain is exhaustive so no line is lost.
  //   Recommended: 100 ms.
  SERIAL_READ_INTERVAL_MS: 100,

  // PUSH_INTERVAL_MS / PULL_INTERVAL_MS
  //   Role: Telemetry push period and setpoint pull period.
  //   Critical: 100–3600000 ms.
  //   Recommended: 1000 ms each.
  PUSH_INTERVAL_MS: 1000,
  PULL_INTERVAL_MS: 1000,

  // LOOP_IDLE_MS
  //   Role: Idle sleep between control loop iterations.
  //   Critical: 1–1000 ms; warns when larger than an activity interval.
  //   Recommended: 50 ms.
  LOOP_IDLE_MS: 50,

  // PUSH_URL / PULL_URL
  //   Role: Control-plane endpoints for telemetry push (POST) and setpoint pull (GET).
  //   Critical: Absolute http(s) URLs.
  PUSH_URL: 'http://127.0.0.1:2000/post',
  PULL_URL: 'http://127.0.0.1:2000/get',

  // HTTP_TIMEOUT_MS
  //   Role: Deadline for each push or pull request.
  //   Critical: 100–60000 ms; keep below the push/pull intervals.
  //   Recommended: 2000 ms.
  HTTP_TIMEOUT_MS: 2000,

  // DEFAULT_SETPOINT
  //   Role: Setpoint (%) sent to the device until the control plane reports one.
  //   Critical: Finite number; warns outside 0–100.
  //   Recommended: 85.
  DEFAULT_SETPOINT: 85.0,

  // TANK_HEIGHT_CM / SENSOR_OFFSET_CM
  //   Role: Tank depth and how far the ultrasonic sensor's face sits below the tank top.
  //   Critical: Positive; offset smaller than tank height.
  TANK_HEIGHT_CM: 15.0,
  SENSOR_OFFSET_CM: 1.3,

  // MIN_WATER_HEIGHT_CM / MAX_WATER_HEIGHT_CM
  //   Role: Water heights read as 0% and 100%.
  //   Critical: MIN < MAX (otherwise the level mapping is degenerate).
  MIN_WATER_HEIGHT_CM: 2.5,
  MAX_WATER_HEIGHT_CM: 10.0,

  // PUMP_RAW_MIN / PUMP_RAW_MAX
  //   Role: Raw pump actuation values mapped to 0% and 100%.
  //   Critical: MIN < MAX. Values above MAX read above 100% (not clamped).
  //   Recommended: 16 / 50 for the stock PWM stage.
  PUMP_RAW_MIN: 16,
  PUMP_RAW_MAX: 50,

  // AUDIT_LOG_PATH
  //   Role: CSV audit trail, one row per push tick.
  //   Critical: Non-empty path; parent directories are created.
  AUDIT_LOG_PATH: 'pid_data.csv',

  // CONSOLE_ENABLED / CONSOLE_LOG_LEVEL / CONSOLE_COLOR
  //   Role: Console sink switch, minimum severity (0=DEBUG..3=CRITICAL) and ANSI colors.
  //   Recommended: enabled, 1 (INFO), colors on for terminals.
  CONSOLE_ENABLED: true,
  CONSOLE_LOG_LEVEL: 1,
  CONSOLE_COLOR: true,

  // FILE_LOG_ENABLED / FILE_LOG_LEVEL / FILE_LOG_PATH
  //   Role: Optional file sink for unattended installs.
  //   Recommended: 2 (WARNING) to keep the file small.
  FILE_LOG_ENABLED: false,
  FILE_LOG_LEVEL: 2,
  FILE_LOG_PATH: 'logs/bridge.log',

  // GLOBAL_LOG_LEVEL
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL); sinks filter further.
  //   Recommended: 1 (INFO), 0 (DEBUG) only while wiring a new rig.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Hours after which INFO lines stop (warnings still pass). 0 disables.
  //   Critical: 0–720 h.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 0,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Wire-protocol and file-format details that only change
//   together with the firmware or the audit consumers.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<BridgeAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // HANDSHAKE_TOKEN
  //   Role: Sentinel printed by the firmware after reset; matched by substring.
  HANDSHAKE_TOKEN: 'INTERLOCK',

  // SETPOINT_FRAME_PREFIX / LINE_TERMINATOR
  //   Role: Outbound command framing: SP:<setpoint>\n
  SETPOINT_FRAME_PREFIX: 'SP:',
  LINE_TERMINATOR: '\n',

  // MAX_LINE_LENGTH
  //   Role: Longest line accepted from the device; longer lines are dropped as noise.
  MAX_LINE_LENGTH: 256,

  // MAX_PENDING_LINES
  //   Role: Lines queued between two drains; the oldest is dropped beyond this.
  MAX_PENDING_LINES: 1000,

  // AUDIT_LOG_HEADER
  //   Role: CSV columns: timestamp, process value, controller output, setpoint.
  AUDIT_LOG_HEADER: ['timestamp', 'PV', 'CO', 'setpoint'],

  // MAX_CONSECUTIVE_ERRORS
  //   Role: Consecutive crashed ticks before the loop reports a sustained failure.
  MAX_CONSECUTIVE_ERRORS: 3,
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────

/**
 * Merge user overrides onto the defaults
 * @param overrides - Values from the environment or CLI; undefined entries are ignored
 * @returns Complete configuration
 */
export function buildConfig(overrides: BridgeConfigOverrides = {}): BridgeConfig {
  const defined: BridgeConfigOverrides = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(defined, { [key]: value });
    }
  }
  return { ...APP_CONSTANTS, ...USER_CONFIG, ...defined };
}

const CONFIG: BridgeConfig = buildConfig();

export default CONFIG;
