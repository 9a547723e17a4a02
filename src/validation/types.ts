/**
 * Validation result types
 */

/**
 * Problem with one configuration field
 * field is the path into the document, e.g. "RULES[2].offAt".
 */
export interface ConfigIssue {
  field: string;
  message: string;
}

/** Refuses start-up */
export type ValidationError = ConfigIssue;

/** Reported; the run continues */
export type ValidationWarning = ConfigIssue;

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Accepted range for a numeric setting
 * Values outside [min, max] are errors; values outside recommended are warnings.
 */
export interface Bounds {
  readonly min: number;
  readonly max: number;
  readonly integer?: boolean;
  readonly recommended?: readonly [number, number];
}
