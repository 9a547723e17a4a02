import type { GrowUserConfig, GrowAppConstants, GrowConfig } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything an operator might reasonably tune. The device
//   registry and rules (SENSORS, ACTUATORS, RULES, BUTTONS) come
//   from the JSON configuration file; scalars below are defaults
//   that the file and the environment may override.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<GrowUserConfig> = {
  // TICK_PERIOD_MS
  //   Role: Control loop period; the timing unit for safety checks and command execution.
  //   Critical: Integer 50–1000 ms (error above 1000: an e-stop must act within a second).
  //   Recommended: 250–500 ms.
  TICK_PERIOD_MS: 250,

  // SAMPLE_PERIOD_SEC
  //   Role: Sensor sampling sub-cycle.
  //   Critical: 5–300 s.
  //   Recommended: 10–120 s; growing environments drift slowly.
  SAMPLE_PERIOD_SEC: 15,

  // SENSOR_TIMEOUT_MS / ACTUATOR_TIMEOUT_MS / INPUT_TIMEOUT_MS
  //   Role: Upper bound for a single device call.
  //   Critical: 10–60000 ms; SENSOR_TIMEOUT_MS shorter than the sampling period.
  //   Recommended: INPUT_TIMEOUT_MS at most TICK_PERIOD_MS so a hung input cannot stall a tick.
  SENSOR_TIMEOUT_MS: 2000,
  ACTUATOR_TIMEOUT_MS: 2000,
  INPUT_TIMEOUT_MS: 200,

  // SENSOR_DEGRADED_AFTER
  //   Role: Consecutive invalid reads before a source is reported degraded.
  //   Critical: Integer 1–100.
  //   Recommended: 3.
  SENSOR_DEGRADED_AFTER: 3,

  // SESSION_GRACE_SEC
  //   Role: How long presence may drop before the open session closes.
  //   Critical: 0–3600 s.
  //   Recommended: 10 s; covers someone stepping out of the mat's range.
  SESSION_GRACE_SEC: 10,

  // DEFAULT_PARTICIPANT
  //   Role: Participant reference for sessions opened by presence alone.
  //   Critical: Non-empty.
  DEFAULT_PARTICIPANT: 'anonymous',

  // INPUT_DEBOUNCE_MS / INPUT_QUEUE_SIZE
  //   Role: Button bounce filter and capacity of the tick input queue.
  //   Critical: Debounce 0–5000 ms; queue 1–1000 entries.
  //   Recommended: 50–250 ms debounce; 32 entries.
  INPUT_DEBOUNCE_MS: 150,
  INPUT_QUEUE_SIZE: 32,

  // EVENT_QUEUE_SIZE / EVENT_DRAIN_INTERVAL_MS
  //   Role: Bounded buffer in front of the event sink and its drain cadence.
  //   Critical: Queue 10–100000 events (oldest dropped on overflow).
  //   Recommended: 1000 events, 500 ms.
  EVENT_QUEUE_SIZE: 1000,
  EVENT_DRAIN_INTERVAL_MS: 500,

  // EVENT_LOG_PATH
  //   Role: JSON-lines file the event sink appends to.
  //   Critical: Empty disables the file sink (events go to the DEBUG log).
  EVENT_LOG_PATH: 'data/events.jsonl',

  // SENSORS / ACTUATORS / RULES / BUTTONS
  //   Role: Static device registry, automation rules and session buttons.
  //   Critical: Unique ids; rules and buttons reference registered devices.
  SENSORS: [],
  ACTUATORS: [],
  RULES: [],
  BUTTONS: [],

  // SLACK_ENABLED
  //   Role: Master switch for Slack notifications.
  //   Recommended: true when the environment runs unattended.
  SLACK_ENABLED: false,

  // SLACK_LOG_LEVEL
  //   Role: Minimum log severity sent to Slack (0=DEBUG..3=CRITICAL).
  //   Recommended: 2 (WARNING).
  SLACK_LOG_LEVEL: 2,

  // SLACK_WEBHOOK_URL
  //   Role: Incoming webhook; normally supplied through the environment.
  //   Critical: Non-empty when SLACK_ENABLED = true (warning otherwise).
  SLACK_WEBHOOK_URL: '',

  // SLACK_BUFFER_SIZE / SLACK_RETRY_DELAY_SEC
  //   Role: Retry buffer size and first retry delay (doubles per attempt, capped at 60 s).
  //   Critical: 1–100 messages; 1–60 s.
  SLACK_BUFFER_SIZE: 10,
  SLACK_RETRY_DELAY_SEC: 1,

  // CONSOLE_ENABLED / CONSOLE_LOG_LEVEL
  //   Role: Console output and its minimum severity.
  //   Recommended: 1 (INFO) for normal operation.
  CONSOLE_ENABLED: true,
  CONSOLE_LOG_LEVEL: 1,

  // CONSOLE_BUFFER_SIZE / CONSOLE_INTERVAL_MS
  //   Role: Console buffer capacity and drain interval.
  //   Critical: 10–10000 lines; 10–5000 ms.
  CONSOLE_BUFFER_SIZE: 500,
  CONSOLE_INTERVAL_MS: 100,

  // GLOBAL_LOG_LEVEL
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL).
  //   Recommended: 1 (INFO), 0 (DEBUG) only while tuning rules.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Uptime after which INFO lines are suppressed (0 disables).
  //   Critical: 0–168 h.
  //   Recommended: 24 h.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 24,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal engine constants that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<GrowAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // MAX_CONSECUTIVE_ERRORS
  //   Role: Consecutive failed ticks before the loop reports itself unhealthy.
  //   Recommended: 3–5.
  MAX_CONSECUTIVE_ERRORS: 5,

  // SLACK_MAX_RETRIES / SLACK_MAX_RETRY_DELAY_MS
  //   Role: Attempts per Slack message and the backoff ceiling.
  SLACK_MAX_RETRIES: 5,
  SLACK_MAX_RETRY_DELAY_MS: 60000,

  // ═══════════════════════════════════════════════════════════════
  // VALIDATION CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // MIN_TICK_PERIOD_MS / MAX_TICK_PERIOD_MS
  //   Role: Bounds for TICK_PERIOD_MS.
  //   Critical: The upper bound is the e-stop reaction budget; do not raise it.
  MIN_TICK_PERIOD_MS: 50,
  MAX_TICK_PERIOD_MS: 1000,

  // MIN_SAMPLE_PERIOD_SEC / MAX_SAMPLE_PERIOD_SEC
  //   Role: Bounds for SAMPLE_PERIOD_SEC.
  MIN_SAMPLE_PERIOD_SEC: 5,
  MAX_SAMPLE_PERIOD_SEC: 300,
};

// ─────────────────────────────────────────────────────────────
// COMBINED DEFAULTS (DEFAULT EXPORT)
// ─────────────────────────────────────────────────────────────

const CONFIG: GrowConfig = { ...USER_CONFIG, ...APP_CONSTANTS };

export default CONFIG;
