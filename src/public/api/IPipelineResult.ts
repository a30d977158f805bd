import {EPipelineStatus} from "./EPipelineStatus";
import {IEvent} from "./IEvent";
import {IJobResult} from "./IJobResult";

/**
 * Outcome of handing the rendered report to the report sink.
 */
export interface IUploadOutcome {
    readonly sink: string;
    readonly ok: boolean;
    readonly error?: string;
}

/**
 * The verdict over a set of job results.
 */
export interface IAggregatedResult {
    readonly overallStatus: EPipelineStatus;

    /**
     * Job results keyed by job name, in job declaration order.
     */
    readonly jobs: ReadonlyMap<string, IJobResult>;
}

export interface IPipelineResult extends IAggregatedResult {
    readonly runId: string;
    readonly pipelineName: string;
    readonly event?: IEvent;

    /**
     * False when no trigger rule matched the event; every job is then skipped.
     */
    readonly triggered: boolean;

    readonly upload?: IUploadOutcome;
    readonly durationMs: number;
}
