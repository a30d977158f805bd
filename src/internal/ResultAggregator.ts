import _ = require("lodash");
import {IJobResult} from "../public/api/IJobResult";
import {IJobDefinition} from "../public/api/IJob";
import {IStepResult} from "../public/api/IStepResult";
import {IAggregatedResult, IPipelineResult, IUploadOutcome} from "../public/api/IPipelineResult";
import {EJobStatus} from "../public/api/EJobStatus";
import {EPipelineStatus} from "../public/api/EPipelineStatus";
import {EReportFormat} from "../public/api/EReportFormat";

/**
 * How many lines of a failed step's output the text report shows.
 */
export const REPORT_OUTPUT_LINES: number = 20;

/**
 * Combines job results into a verdict: failed when any job failed, passed otherwise.
 *
 * The jobs are ordered by `jobOrder` (declaration order) rather than by completion; jobs missing from `jobOrder`
 * follow in their original order.
 */
export function aggregate(results: ReadonlyMap<string, IJobResult>,
                          jobOrder?: ReadonlyArray<string>): IAggregatedResult {
    const ordered: Map<string, IJobResult> = new Map();

    _.forEach(jobOrder, (name: string) => {
        const result: IJobResult | undefined = results.get(name);
        if (result) {
            ordered.set(name, result);
        }
    });
    results.forEach((result: IJobResult, name: string) => {
        if (!ordered.has(name)) {
            ordered.set(name, result);
        }
    });

    let failed: boolean = false;
    ordered.forEach((result: IJobResult) => {
        failed = failed || result.status === EJobStatus.failed;
    });

    return {
        overallStatus: failed ? EPipelineStatus.failed : EPipelineStatus.passed,
        jobs: ordered
    };
}

/**
 * Results for a pipeline whose jobs never started.
 */
export function skipAll(jobs: ReadonlyArray<IJobDefinition>): Map<string, IJobResult> {
    const retVal: Map<string, IJobResult> = new Map();
    _.forEach(jobs, (job: IJobDefinition) => {
        retVal.set(job.name, {jobName: job.name, status: EJobStatus.skipped, steps: [], durationMs: 0});
    });
    return retVal;
}

/**
 * Records the upload outcome. A failed upload fails the pipeline only in strict mode.
 */
export function applyUploadOutcome(result: IPipelineResult, outcome: IUploadOutcome, strict: boolean): IPipelineResult {
    return {
        ...result,
        overallStatus: !outcome.ok && strict ? EPipelineStatus.failed : result.overallStatus,
        upload: outcome
    };
}

export function renderReport(result: IPipelineResult, format: EReportFormat): string {
    return format === EReportFormat.json
        ? JSON.stringify(toReportObject(result), null, 2)
        : renderText(result);
}

/**
 * A plain object version of the result, suitable for JSON.
 */
export function toReportObject(result: IPipelineResult): object {
    const jobs: object[] = [];
    result.jobs.forEach((job: IJobResult) => {
        jobs.push({
            name: job.jobName,
            status: job.status,
            durationMs: job.durationMs,
            firstFailureIndex: job.firstFailureIndex,
            error: job.error,
            steps: _.map(job.steps, (step: IStepResult) => ({
                name: step.stepName,
                exitCode: step.exitCode,
                durationMs: step.durationMs,
                output: step.output
            }))
        });
    });

    return {
        runId: result.runId,
        pipeline: result.pipelineName,
        event: result.event,
        triggered: result.triggered,
        status: result.overallStatus,
        durationMs: result.durationMs,
        jobs: jobs,
        upload: result.upload
    };
}

function renderText(result: IPipelineResult): string {
    const lines: string[] = [];

    lines.push(`Pipeline ${result.pipelineName} (run ${result.runId}): ${result.overallStatus.toUpperCase()}`);

    if (result.event) {
        lines.push(`Event: ${result.event.kind} to ${result.event.branch}`);
        if (!result.triggered) {
            lines.push("No trigger matched the event; no job ran.");
        }
    }

    result.jobs.forEach((job: IJobResult) => {
        const label: string = _.padEnd("[" + job.status.toUpperCase() + "]", 10);
        lines.push("  " + label + job.jobName + describeJob(job));

        if (job.firstFailureIndex !== undefined) {
            const failedStep: IStepResult | undefined = job.steps[job.firstFailureIndex];
            if (failedStep) {
                _.forEach(tail(failedStep.output, REPORT_OUTPUT_LINES), (line: string) => {
                    lines.push("      | " + line);
                });
            }
        }
    });

    if (result.upload) {
        lines.push(result.upload.ok
            ? `Report upload to ${result.upload.sink}: ok`
            : `Report upload to ${result.upload.sink}: failed` +
            (result.upload.error ? ` (${result.upload.error})` : ""));
    }

    return lines.join("\n") + "\n";
}

function describeJob(job: IJobResult): string {
    const duration: string = formatDuration(job.durationMs);

    if (job.status === EJobStatus.skipped) {
        return "";
    } else if (job.firstFailureIndex !== undefined) {
        const failedStep: IStepResult | undefined = job.steps[job.firstFailureIndex];
        const stepName: string = failedStep ? failedStep.stepName : "?";
        const exitCode: string = failedStep ? String(failedStep.exitCode) : "?";
        return ` (failed at step ${job.firstFailureIndex + 1} "${stepName}", exit code ${exitCode}, ${duration})`;
    } else if (job.error) {
        return ` (${job.error}, ${duration})`;
    } else {
        return ` (${job.steps.length} step${job.steps.length === 1 ? "" : "s"}, ${duration})`;
    }
}

function formatDuration(ms: number): string {
    return (ms / 1000).toFixed(2) + "s";
}

function tail(output: string, count: number): string[] {
    const trimmed: string = _.trimEnd(output, "\r\n");
    if (!trimmed) {
        return [];
    }
    return _.takeRight(trimmed.split(/\r?\n/), count);
}
