/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  MS_PER_HOUR: 3600 * 1000,
} as const;
