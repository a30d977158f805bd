/**
 * Terminal status of a job.
 */
export enum EJobStatus {
    passed = "passed",
    failed = "failed",

    /**
     * The job never started, e.g. the pipeline was not triggered.
     */
    skipped = "skipped"
}
