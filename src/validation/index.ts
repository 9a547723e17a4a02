export { validateConfig } from './validator';
export { addError, addWarning, checkBounds, checkEntityBounds } from './helpers';
export type { Bounds, ConfigIssue, ValidationError, ValidationWarning, ValidationResult } from './types';
