/**
 * Controller initialization
 *
 * Builds the logger, the event queue and every control component from a
 * validated configuration and the drivers supplied at startup.
 */

import { buildSensorRegistry, createAutomationScheduler, createEnvironmentSampler, createSafetyMonitor } from '@core';
import { createEventQueue, createJsonlSink, toJsonLine } from '@events';
import type { EventSink } from '@events';
import { createSessionManager } from '@features/session';
import { createConsoleSink, createLogger, createSlackSink } from '@logging';
import type { ConsoleSink, InitMessage, Logger, SinkWithLevel } from '@logging';
import { createActuatorController } from '@system/actuation';
import { createControlLoop } from '@system/control';
import type { ControlComponents } from '@system/control';
import { createInputQueue } from '@system/inputs';
import type { GrowConfig } from '$types';
import type { Controller, Devices, RuntimeDependencies } from './types';

export interface Logging {
  logger: Logger;
  /** Present when CONSOLE_ENABLED */
  consoleSink: ConsoleSink | null;
}

/**
 * Build the logger and its sinks
 * @param config - Validated configuration
 * @param deps - Runtime services
 * @returns Logger plus the console sink, which needs stopping on shutdown
 */
export function createLogging(config: GrowConfig, deps: RuntimeDependencies): Logging {
  const sinks: SinkWithLevel[] = [];
  let consoleSink: ConsoleSink | null = null;

  if (config.CONSOLE_ENABLED) {
    consoleSink = createConsoleSink(deps.timerApi, deps.consoleApi, {
      bufferSize: config.CONSOLE_BUFFER_SIZE,
      drainInterval: config.CONSOLE_INTERVAL_MS
    }, deps.painter);
    sinks.push({ sink: consoleSink, minLevel: config.CONSOLE_LOG_LEVEL });
  }

  if (config.SLACK_ENABLED) {
    const slackSink = createSlackSink(deps.httpPost, deps.timerApi, {
      enabled: config.SLACK_ENABLED,
      webhookUrl: config.SLACK_WEBHOOK_URL,
      bufferSize: config.SLACK_BUFFER_SIZE,
      retryDelayMs: config.SLACK_RETRY_DELAY_SEC * 1000,
      maxRetryDelayMs: config.SLACK_MAX_RETRY_DELAY_MS,
      maxRetries: config.SLACK_MAX_RETRIES
    });
    sinks.push({ sink: slackSink, minLevel: config.SLACK_LOG_LEVEL });
  }

  const logger = createLogger({
    level: config.GLOBAL_LOG_LEVEL,
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: deps.clock,
    sinks: sinks
  }, config.LOG_LEVELS);

  return { logger: logger, consoleSink: consoleSink };
}

/**
 * Event sink that writes each event to the DEBUG log
 */
export function createLogEventSink(logger: Logger): EventSink {
  return {
    append: function(event) {
      logger.debug('Event ' + toJsonLine(event).trim());
    }
  };
}

/**
 * Wire the controller
 *
 * @param config - Validated configuration
 * @param devices - Drivers for the registry in config
 * @param deps - Runtime services
 * @param logging - Logger built earlier with createLogging, when the caller needed it first
 * @returns Controller, not yet started
 * @throws ConfigInvalidError when a registered sensor has no matching driver
 */
export function initialize(
  config: GrowConfig,
  devices: Devices,
  deps: RuntimeDependencies,
  logging: Logging = createLogging(config, deps)
): Controller {
  const logger = logging.logger;

  const registry = buildSensorRegistry(config.SENSORS, devices.sensors);

  let eventSink: EventSink;
  if (deps.eventSink !== undefined) {
    eventSink = deps.eventSink;
  } else if (config.EVENT_LOG_PATH !== '') {
    eventSink = createJsonlSink(config.EVENT_LOG_PATH);
  } else {
    eventSink = createLogEventSink(logger);
  }
  const events = createEventQueue(eventSink, deps.timerApi, logger, {
    capacity: config.EVENT_QUEUE_SIZE,
    drainIntervalMs: config.EVENT_DRAIN_INTERVAL_MS
  });

  const actuatorIds = config.ACTUATORS.map(function(a) { return a.id; });

  const components: ControlComponents = {
    safety: createSafetyMonitor(
      { estop: devices.estop, override: devices.override },
      actuatorIds,
      deps.timerApi,
      logger,
      events,
      config,
      deps.clock()
    ),
    sampler: createEnvironmentSampler(registry, deps.timerApi, logger, events, config),
    scheduler: createAutomationScheduler(config.RULES, logger),
    actuators: createActuatorController(config.ACTUATORS, {
      sink: devices.sink,
      timerApi: deps.timerApi,
      logger: logger,
      publisher: events,
      clock: deps.clock
    }, config),
    session: createSessionManager({
      presence: devices.presence,
      timerApi: deps.timerApi,
      logger: logger,
      publisher: events,
      createId: deps.createId
    }, config),
    inputs: createInputQueue(config, logger)
  };

  const loop = createControlLoop(components, { timerApi: deps.timerApi, logger: logger, clock: deps.clock }, config);

  function start(): void {
    logger.initialize(function(_success: boolean, messages: InitMessage[]) {
      logger.info(
        '🌱 Grow controller | ' + config.SENSORS.length + ' sensors, ' + config.ACTUATORS.length + ' actuators, ' +
        config.RULES.length + ' rules, ' + config.BUTTONS.length + ' buttons'
      );
      logger.info('⏱️ tick ' + config.TICK_PERIOD_MS + 'ms | sampling ' + config.SAMPLE_PERIOD_SEC + 's | session grace ' + config.SESSION_GRACE_SEC + 's');

      // Straight to the console: the sink reporting may be the one that failed
      for (const message of messages) {
        if (!message.success) {
          deps.consoleApi.warn('⚠️ [WARNING]  ' + message.message);
        }
      }
    });
    events.start();
    loop.start();
  }

  async function shutdown(): Promise<void> {
    await loop.stop();
    const now = deps.clock();
    components.session.close('shutdown', now);
    await components.actuators.shutdown(now);
    logger.info('Controller stopped, every actuator off');

    events.stop();
    await events.flush();
    logger.flush();
    if (logging.consoleSink !== null) {
      logging.consoleSink.stop();
    }
  }

  return {
    config: config,
    logger: logger,
    events: events,
    components: components,
    loop: loop,
    start: start,
    shutdown: shutdown
  };
}
