/**
 * Sensor types
 */

/**
 * Result of normalising one raw read
 */
export type NormalizedValue =
  | { valid: true; value: number; unit: string }
  | { valid: false; value: number | null; unit: string; error: string };
