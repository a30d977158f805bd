/**
 * The kinds of events that can trigger a pipeline.
 */
export enum EEventKind {
    push = "push",
    pull_request = "pull_request"
}
