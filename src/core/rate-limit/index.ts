export {
  createRateLimitRecord,
  checkMinInterval,
  checkMaxRuntime,
  checkActivation,
  remainingBudgetMs,
  recordActivation,
  recordDeactivation,
  exceededOnLimit
} from './rate-limit';
export { toRateLimitConfig, runtimeInWindow, pruneRuntimeLog } from './helpers';
export { RATE_LIMITS } from './types';
export type { RateLimitCheckResult, RateLimitConfig, RateLimitRecord, RateLimitType, RuntimeSpan } from './types';
