/**
 * Control loop helpers
 * Stage wiring and status formatting
 */

import type { ActuatorCommand, InputMessage } from '@events';
import { fmtValue } from '@logging';
import type { ControlComponents, ControlStatus } from './types';

/**
 * Apply queued inputs
 *
 * Resets go to the safety monitor; everything else goes to the session
 * manager, which may turn it into human commands.
 *
 * @param messages - Inputs drained this tick, in arrival order
 * @param components - Loop components
 * @param now - Tick time (ms)
 * @returns Human commands in generation order
 */
export function applyInputs(messages: readonly InputMessage[], components: ControlComponents, now: number): ActuatorCommand[] {
  const commands: ActuatorCommand[] = [];
  for (const message of messages) {
    if (message.type === 'safety_reset') {
      components.safety.requestReset();
      continue;
    }
    const produced = components.session.handle(message, now);
    for (const command of produced) {
      commands.push(command);
    }
  }
  return commands;
}

/**
 * Format an uptime as a short human-readable string
 */
export function formatUptime(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return Math.round(seconds) + "s";
  } else if (seconds < 3600) {
    return Math.round(seconds / 60) + "m";
  } else {
    return Math.round(seconds / 3600) + "h";
  }
}

/**
 * Render the status report as text lines
 * @param status - Status report
 * @returns Lines ready for a terminal
 */
export function formatStatus(status: ControlStatus): string[] {
  const lines: string[] = [];
  const loop = status.loop;

  lines.push(
    'Safety: ' + status.safety.state + ' (' + status.safety.reason + ')' +
    ' | uptime ' + formatUptime(status.now - loop.startTime) +
    ' | ticks ' + loop.tickCount + ', skipped ' + loop.skippedTicks + ', errors ' + loop.consecutiveErrors
  );

  for (const sensor of status.sensors) {
    const shown = sensor.latest !== null && sensor.latest.valid ? sensor.latest : sensor.lastValid;
    const value = shown === null ? 'n/a' : fmtValue(shown.value, shown.unit);
    const stale = sensor.latest !== null && !sensor.latest.valid ? ' (last valid, ' + sensor.consecutiveFailures + ' failed)' : '';
    lines.push('  ' + sensor.sourceId + ': ' + value + stale + (sensor.degraded ? ' DEGRADED' : ''));
  }

  for (const actuator of status.actuators) {
    let state = actuator.on ? 'ON' : 'off';
    if (actuator.pulseEndsAt !== null) {
      state += ' (pulse, ' + Math.max(0, Math.ceil((actuator.pulseEndsAt - status.now) / 1000)) + 's left)';
    }
    if (actuator.pendingOff) {
      state += ' (off pending)';
    }
    lines.push('  ' + actuator.actuatorId + ': ' + state + ', ' + Math.round(actuator.runtimeInWindowMs / 1000) + 's in window');
  }

  if (status.session === null) {
    lines.push('Session: none' + (status.present ? ' (presence detected)' : ''));
  } else {
    lines.push('Session: ' + status.session.sessionId + ' for ' + status.session.participantRef + ', ' + status.session.activities.length + ' activities');
  }
  return lines;
}
