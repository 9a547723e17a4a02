/**
 * Session manager
 *
 * Tracks at most one supervised session. Presence opens a session and a
 * grace period closes it once presence is gone; operators can also start and
 * end sessions explicitly. Button presses inside a session become activities
 * and, where configured, human commands.
 */

import { randomUUID } from 'node:crypto';

import { describeError } from '$types';
import type { ButtonSpec, DigitalInput, TimerAPI } from '$types';
import type { ActivityEvent, ActuatorAction, ActuatorCommand, EventPublisher, Session, SessionEndReason } from '@events';
import { formatAction } from '@events';
import { readInput } from '@hardware/inputs';
import type { Logger } from '@logging';
import { closeSessionRecord, graceExpired, snapshotSession, toActuatorAction } from './helpers';
import type { OpenSession, PresenceState, SessionConfig, SessionManager, SessionMessage } from './types';

export interface SessionManagerDependencies {
  /** Presence input (pressure mat, door contact, badge reader) */
  presence: DigitalInput;
  timerApi: TimerAPI;
  logger: Logger;
  publisher: EventPublisher;
  /** Session id factory */
  createId?: () => string;
}

/**
 * Create the session manager
 *
 * @param deps - Presence input, timer, logger and publisher
 * @param config - Grace period, default participant and button table
 * @returns Session manager
 */
export function createSessionManager(deps: SessionManagerDependencies, config: SessionConfig): SessionManager {
  const logger = deps.logger;
  const createId = deps.createId ?? randomUUID;
  const buttons = new Map<string, ButtonSpec>();
  for (const button of config.BUTTONS) {
    buttons.set(button.id, button);
  }

  const presence: PresenceState = { present: false, graceStartedAt: null, faultReported: false };
  let current: OpenSession | null = null;

  function record(kind: string, now: number, detail: string): void {
    if (current === null) {
      return;
    }
    const activity: ActivityEvent = { kind: kind, timestamp: now, detail: detail };
    current.activities.push(activity);
  }

  function open(participantRef: string, now: number): void {
    if (current !== null) {
      close('superseded', now);
    }
    current = { sessionId: createId(), participantRef: participantRef, startedAt: now, activities: [] };
    presence.graceStartedAt = null;
    deps.publisher.publish({ type: 'session', timestamp: now, payload: { phase: 'opened', session: snapshotSession(current) } });
    logger.info('Session ' + current.sessionId + ' opened for ' + participantRef);
  }

  function close(reason: SessionEndReason, now: number): void {
    if (current === null) {
      return;
    }
    const closed = closeSessionRecord(current, reason, now);
    current = null;
    presence.graceStartedAt = null;
    deps.publisher.publish({ type: 'session', timestamp: now, payload: { phase: 'closed', session: closed } });
    logger.info('Session ' + closed.sessionId + ' closed (' + reason + ', ' + closed.activities.length + ' activities)');
  }

  function applyPresence(present: boolean, now: number): void {
    const was = presence.present;
    presence.present = present;

    if (present && !was) {
      if (current === null) {
        open(config.DEFAULT_PARTICIPANT, now);
      } else if (presence.graceStartedAt !== null) {
        presence.graceStartedAt = null;
        record('presence_returned', now, 'grace cancelled');
      }
    } else if (!present && was && current !== null) {
      presence.graceStartedAt = now;
      record('presence_lost', now, 'grace ' + config.SESSION_GRACE_SEC + 's');
    }

    if (graceExpired(presence.graceStartedAt, now, config.SESSION_GRACE_SEC)) {
      close('participant_left', now);
    }
  }

  async function tick(now: number): Promise<void> {
    let present = presence.present;
    try {
      present = await readInput(deps.presence, 'presence', deps.timerApi, config.INPUT_TIMEOUT_MS);
      if (presence.faultReported) {
        presence.faultReported = false;
        logger.info('Presence input readable again');
      }
    } catch (err) {
      if (!presence.faultReported) {
        presence.faultReported = true;
        logger.warning('Presence input unreadable, keeping ' + (presence.present ? 'present' : 'absent') + ': ' + describeError(err));
      }
    }
    applyPresence(present, now);
  }

  function humanCommand(actuatorId: string, action: ActuatorAction, now: number, reason: string, source: string): ActuatorCommand {
    return { actuatorId: actuatorId, action: action, origin: 'human', issuedAt: now, reason: reason, source: source };
  }

  function handle(message: SessionMessage, now: number): ActuatorCommand[] {
    switch (message.type) {
      case 'session_start':
        open(message.participantRef, now);
        return [];

      case 'session_end':
        if (current === null) {
          logger.info('No open session to end');
        } else {
          close('ended', now);
        }
        return [];

      case 'manual_command':
        record('manual_command', now, message.actuatorId + ' ' + formatAction(message.action));
        return [humanCommand(message.actuatorId, message.action, now, 'manual command', 'operator')];

      case 'button': {
        const button = buttons.get(message.buttonId);
        if (button === undefined) {
          logger.warning('Unknown button ' + message.buttonId);
          return [];
        }
        if (current === null) {
          logger.info('Button ' + button.id + ' pressed outside a session, ignored');
          return [];
        }
        record(button.activity, now, 'button ' + button.id);
        if (button.command === undefined) {
          return [];
        }
        return [humanCommand(button.command.actuatorId, toActuatorAction(button.command.action), now, 'button ' + button.id, button.id)];
      }
    }
  }

  return {
    tick: tick,
    handle: handle,
    getCurrent: function(): Session | null {
      return current === null ? null : snapshotSession(current);
    },
    isPresent: function() { return presence.present; },
    close: close
  };
}
