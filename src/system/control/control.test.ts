/**
 * Tests for the control loop, wired with real components and in-memory devices
 */

import type { ActuatorSpec, ButtonSpec, RuleSpec } from '$types';
import {
  createFakeInput,
  createFakeLogger,
  createFakeTimer,
  createMemoryEventSink,
  createRecordingActuatorSink,
  createScriptedSource,
  flushPromises,
  raw
} from '$test-utils';
import type { FakeInput, FakeLogger, FakeTimer, MemoryEventSink, RecordingActuatorSink, ScriptedSource } from '$test-utils';
import { createAutomationScheduler, createEnvironmentSampler, createSafetyMonitor } from '@core';
import { createSessionManager } from '@features/session';
import { createActuatorController } from '@system/actuation';
import { createInputQueue } from '@system/inputs';
import { createControlLoop } from './control';
import type { ControlComponents, ControlLoop } from './types';

const FAN: ActuatorSpec = { id: 'fan', minIntervalSec: 0, maxRuntimeSec: 3600, runtimeWindowSec: 3600, maxPulseSec: 600, maxOnSec: 3600 };
const PUMP: ActuatorSpec = { id: 'pump', minIntervalSec: 300, maxRuntimeSec: 180, runtimeWindowSec: 3600, maxPulseSec: 30, maxOnSec: 60 };

const RULES: RuleSpec[] = [
  {
    id: 'fan-heat',
    type: 'threshold',
    actuatorId: 'fan',
    sensorId: 'air-temp',
    direction: 'above',
    onAt: 28,
    offAt: 22,
    action: { type: 'on' },
    cooldownSec: 0
  }
];

const BUTTONS: ButtonSpec[] = [
  { id: 'water', activity: 'watering', command: { actuatorId: 'pump', action: { type: 'pulse', durationSec: 10 } } }
];

describe('createControlLoop', () => {
  let timer: FakeTimer;
  let logger: FakeLogger;
  let events: MemoryEventSink;
  let sink: RecordingActuatorSink;
  let air: ScriptedSource;
  let estop: FakeInput;
  let override: FakeInput;
  let presence: FakeInput;
  let components: ControlComponents;

  function build(overrides: Partial<ControlComponents> = {}, maxErrors = 5): ControlLoop {
    return createControlLoop(
      { ...components, ...overrides },
      { timerApi: timer, logger: logger, clock: timer.now },
      { TICK_PERIOD_MS: 250, MAX_CONSECUTIVE_ERRORS: maxErrors }
    );
  }

  beforeEach(() => {
    timer = createFakeTimer();
    logger = createFakeLogger();
    events = createMemoryEventSink();
    sink = createRecordingActuatorSink();
    air = createScriptedSource('air-temp', 'temperature', [raw(30)]);
    estop = createFakeInput(false);
    override = createFakeInput(false);
    presence = createFakeInput(false);

    components = {
      safety: createSafetyMonitor({ estop: estop, override: override }, ['fan', 'pump'], timer, logger, events, { INPUT_TIMEOUT_MS: 200 }, 0),
      sampler: createEnvironmentSampler(
        [{ source: air, spec: { id: 'air-temp', kind: 'temperature', unit: 'C', min: -10, max: 50 } }],
        timer,
        logger,
        events,
        { SAMPLE_PERIOD_SEC: 15, SENSOR_TIMEOUT_MS: 2000, SENSOR_DEGRADED_AFTER: 3 }
      ),
      scheduler: createAutomationScheduler(RULES, logger),
      actuators: createActuatorController([FAN, PUMP], { sink: sink, timerApi: timer, logger: logger, publisher: events, clock: timer.now }, { ACTUATOR_TIMEOUT_MS: 500 }),
      session: createSessionManager(
        { presence: presence, timerApi: timer, logger: logger, publisher: events, createId: function() { return 'session-1'; } },
        { SESSION_GRACE_SEC: 10, DEFAULT_PARTICIPANT: 'anonymous', INPUT_TIMEOUT_MS: 200, BUTTONS: BUTTONS }
      ),
      inputs: createInputQueue({ INPUT_DEBOUNCE_MS: 150, INPUT_QUEUE_SIZE: 32 }, logger)
    };
  });

  describe('tick', () => {
    it('should sample, evaluate rules and drive the actuator', async () => {
      const loop = build();

      await loop.tick(0);

      expect(sink.calls).toEqual([{ actuatorId: 'fan', on: true }]);
      expect(events.ofType('reading')).toHaveLength(1);
      expect(loop.getStatus().loop.tickCount).toBe(1);
    });

    it('should stop every actuator and skip automation on an emergency stop', async () => {
      const loop = build();
      estop.value = true;

      await loop.tick(0);

      expect(sink.calls).toHaveLength(2);
      expect(sink.calls).toEqual(expect.arrayContaining([{ actuatorId: 'fan', on: false }, { actuatorId: 'pump', on: false }]));
      expect(loop.getStatus().safety.state).toBe('stopped');
    });

    it('should stop a running actuator before anything else on the same tick', async () => {
      const loop = build();
      await loop.tick(0);
      estop.value = true;
      components.inputs.push({ type: 'manual_command', actuatorId: 'pump', action: { type: 'on' }, at: 250 });

      await loop.tick(250);

      const outcomes = events.ofType('command').map(function(e) { return e.payload.command.actuatorId + ' ' + e.payload.command.origin + ' ' + e.payload.status; });
      expect(outcomes.slice(1)).toEqual(expect.arrayContaining(['fan safety executed', 'pump safety executed', 'pump human rejected']));
      expect(sink.state('fan')).toBe(false);
      expect(sink.state('pump')).toBe(false);
    });

    it('should resume after an operator reset from the input queue', async () => {
      const loop = build();
      estop.value = true;
      await loop.tick(0);
      estop.value = false;
      await loop.tick(250);
      expect(loop.getStatus().safety.state).toBe('stopped');

      components.inputs.push({ type: 'safety_reset', at: 400 });
      await loop.tick(500);

      expect(loop.getStatus().safety.state).toBe('normal');
      expect(sink.state('fan')).toBe(true);
    });

    it('should leave automation alone while overridden', async () => {
      const loop = build();
      override.value = true;

      await loop.tick(0);

      expect(sink.calls).toEqual([]);
      expect(loop.getStatus().safety.state).toBe('overridden');
    });

    it('should turn a button press inside a session into a pulse', async () => {
      const loop = build();
      components.inputs.push({ type: 'session_start', participantRef: 'alice', at: 0 });
      components.inputs.push({ type: 'button', buttonId: 'water', at: 0 });

      await loop.tick(0);

      expect(sink.calls).toEqual(expect.arrayContaining([{ actuatorId: 'pump', on: true }]));
      expect(loop.getStatus().actuators[1]).toMatchObject({ actuatorId: 'pump', on: true, pulseEndsAt: 10000 });
      expect(loop.getStatus().session?.activities).toEqual([{ kind: 'watering', timestamp: 0, detail: 'button water' }]);
    });

    it('should skip a tick while the previous one is still running', async () => {
      const loop = build();
      estop.hanging = true;

      const first = loop.tick(0);
      const second = loop.tick(250);
      await flushPromises();
      timer.advance(200);
      await Promise.all([first, second]);

      const status = loop.getStatus();
      expect(status.loop.skippedTicks).toBe(1);
      expect(status.loop.tickCount).toBe(1);
      expect(logger.at(2)).toContain('Tick at 250 skipped: previous tick still running');
    });

    it('should contain a crashing stage and count consecutive failures', async () => {
      const sampler = components.sampler;
      const loop = build({
        sampler: {
          isDue: sampler.isDue,
          getSnapshot: sampler.getSnapshot,
          sample: function() { return Promise.reject(new Error('bus exploded')); }
        }
      }, 2);

      await loop.tick(0);
      await loop.tick(250);

      expect(loop.getStatus().loop).toMatchObject({ consecutiveErrors: 2, lastError: 'bus exploded', lastErrorTime: 250, tickCount: 2 });
      expect(logger.at(3)).toEqual([
        'Control tick crashed: bus exploded',
        'Control tick crashed: bus exploded',
        '2 consecutive tick failures, check hardware and configuration'
      ]);
    });
  });

  describe('start / stop', () => {
    it('should tick on the timer until stopped', async () => {
      const loop = build();

      loop.start();
      loop.start();
      timer.advance(250);
      await flushPromises();
      timer.advance(250);
      await flushPromises();
      await loop.stop();

      expect(loop.getStatus().loop.tickCount).toBe(2);
      expect(loop.getStatus().loop.lastTickAt).toBe(500);
      expect(logger.at(1)).toEqual(expect.arrayContaining(['Control loop started (250ms tick)', 'Control loop stopped after 2 ticks']));
      expect(timer.pendingCount()).toBe(0);
    });
  });
});
