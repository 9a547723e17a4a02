/**
 * Control loop implementation
 *
 * One cooperative loop. Each tick runs the stages in a fixed order:
 * inputs -> safety -> sampling (when due) -> presence -> scheduler ->
 * actuator controller -> limit enforcement. No error escapes a tick.
 */

import { describeError } from '$types';
import type { ActuatorCommand } from '@events';
import { SAFETY_STATES } from '@events';
import { createInitialLoopState, recordTickError } from '@system/state/state';
import { applyInputs } from './helpers';
import type { ControlComponents, ControlLoop, ControlLoopConfig, ControlLoopDependencies, ControlStatus } from './types';

/**
 * Create the control loop
 *
 * @param components - Safety, sampler, scheduler, actuators, session and inputs
 * @param deps - Timer, logger and clock
 * @param config - Tick period and error threshold
 * @returns Control loop
 */
export function createControlLoop(
  components: ControlComponents,
  deps: ControlLoopDependencies,
  config: ControlLoopConfig
): ControlLoop {
  const logger = deps.logger;
  const state = createInitialLoopState(deps.clock());
  let running: Promise<void> | null = null;
  let timerId: number | null = null;

  async function runStages(now: number): Promise<void> {
    // Inputs queued since the last tick
    const humanCommands = applyInputs(components.inputs.drain(), components, now);

    // Safety first: a stop reaches the actuators before anything else this tick
    const safety = await components.safety.tick(now);
    if (safety.commands.length > 0) {
      await components.actuators.execute(safety.commands, safety.state, now);
    }

    if (components.sampler.isDue(now)) {
      await components.sampler.sample(now);
    }

    await components.session.tick(now);

    // Automation only runs in normal; stopped and overridden leave actuators to people
    let schedulerCommands: ActuatorCommand[] = [];
    if (safety.state === SAFETY_STATES.NORMAL) {
      schedulerCommands = components.scheduler.evaluate({
        readings: components.sampler.getSnapshot().readings,
        now: now,
        actuators: components.actuators.getSnapshot(now)
      });
    }

    const batch = humanCommands.concat(schedulerCommands);
    if (batch.length > 0) {
      await components.actuators.execute(batch, components.safety.getState(), now);
    }

    await components.actuators.enforceLimits(now);
  }

  async function runTick(now: number): Promise<void> {
    const started = deps.clock();
    try {
      await runStages(now);
      state.consecutiveErrors = 0;
    } catch (e) {
      const errorMsg = describeError(e);
      const count = recordTickError(state, now, errorMsg);
      logger.critical("Control tick crashed: " + errorMsg);
      if (count === config.MAX_CONSECUTIVE_ERRORS) {
        logger.critical(count + " consecutive tick failures, check hardware and configuration");
      }
    } finally {
      state.tickCount++;
      state.lastTickAt = now;
      state.lastTickDurationMs = deps.clock() - started;
    }
  }

  function tick(now: number): Promise<void> {
    if (running !== null) {
      state.skippedTicks++;
      logger.warning("Tick at " + now + " skipped: previous tick still running");
      return running;
    }
    const current = runTick(now).finally(function() {
      running = null;
    });
    running = current;
    return current;
  }

  function start(): void {
    if (timerId !== null) {
      return;
    }
    timerId = deps.timerApi.set(config.TICK_PERIOD_MS, true, function() {
      tick(deps.clock()).catch(function(err: unknown) {
        logger.critical("Control tick rejected: " + describeError(err));
      });
    });
    logger.info("Control loop started (" + config.TICK_PERIOD_MS + "ms tick)");
  }

  async function stop(): Promise<void> {
    if (timerId !== null) {
      deps.timerApi.clear(timerId);
      timerId = null;
      logger.info("Control loop stopped after " + state.tickCount + " ticks");
    }
    if (running !== null) {
      await running;
    }
  }

  function getStatus(): ControlStatus {
    const now = deps.clock();
    return {
      now: now,
      loop: { ...state },
      safety: components.safety.getSnapshot(),
      actuators: components.actuators.getSnapshot(now),
      session: components.session.getCurrent(),
      present: components.session.isPresent(),
      sensors: components.sampler.getSnapshot().sources
    };
  }

  return {
    tick: tick,
    start: start,
    stop: stop,
    getStatus: getStatus
  };
}
