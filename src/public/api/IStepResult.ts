/**
 * What happened when a step ran. A non-zero exit code is a result, not an error.
 */
export interface IStepResult {
    readonly stepName: string;
    readonly exitCode: number;
    readonly durationMs: number;

    /**
     * Combined stdout and stderr. Only the tail is kept when the output is larger than the runner's output limit.
     */
    readonly output: string;
}
