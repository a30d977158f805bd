import {EJobStatus} from "./EJobStatus";
import {IStepResult} from "./IStepResult";

export interface IJobResult {
    readonly jobName: string;
    readonly status: EJobStatus;

    /**
     * Results of the steps that ran, in declared order. Nothing is recorded after the first failure.
     */
    readonly steps: ReadonlyArray<IStepResult>;

    /**
     * Index into `steps` of the step that failed the job.
     */
    readonly firstFailureIndex?: number;

    /**
     * Set when the job failed before any step could run, e.g. its environment could not be provisioned.
     */
    readonly error?: string;

    readonly durationMs: number;
}
