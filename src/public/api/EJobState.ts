/**
 * Lifecycle of a job inside the scheduler.
 */
export enum EJobState {
    notStarted = "not-started",
    running = "running",
    passed = "passed",
    failed = "failed"
}

/**
 * Lifecycle of the whole pipeline inside the scheduler.
 */
export enum EPipelineState {
    notStarted = "not-started",
    running = "running",
    completed = "completed"
}
