/**
 * @packageDocumentation
 * Time-related constants used across the codebase.
 *
 * These constants centralize commonly used time units to avoid magic
 * numbers and make intent clear in retry calculations and tests.
 */
/** Number of milliseconds in one second. */
export const MS_PER_SECOND = 1000;

/**
 * Wait between clean passes. The IDE can hold or regenerate `bin`/`obj` for a
 * moment after a build finishes.
 */
export const CLEAN_RETRY_DELAY_MS = 3 * MS_PER_SECOND;
