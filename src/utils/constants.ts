/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  SECONDS_PER_HOUR: 3600,
  MS_PER_HOUR: 3600000,
  MINUTES_PER_DAY: 1440,
} as const;
