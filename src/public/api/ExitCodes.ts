/**
 * Exit code recorded for a step that ran past its timeout (or the pipeline deadline).
 */
export const TIMEOUT_CODE: number = 124;

/**
 * Exit code recorded for a step that could not be launched at all.
 */
export const SPAWN_FAILURE_CODE: number = 127;

/**
 * Exit code recorded for a step that was stopped, or never launched, because the pipeline was cancelled.
 */
export const CANCELLED_CODE: number = 130;
