export { createSessionManager } from './session';
export type { SessionManagerDependencies } from './session';
export { toActuatorAction, snapshotSession, closeSessionRecord, graceExpired } from './helpers';
export type { OpenSession, PresenceState, SessionConfig, SessionManager, SessionMessage } from './types';
