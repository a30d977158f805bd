/**
 * The overall verdict of a pipeline run.
 */
export enum EPipelineStatus {
    passed = "passed",
    failed = "failed"
}
