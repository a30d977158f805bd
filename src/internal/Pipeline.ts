import _ = require("lodash");
import async = require("async");
import {IJobDefinition} from "../public/api/IJob";
import {IJobResult} from "../public/api/IJobResult";
import {IEnvironmentFactory} from "../public/api/IEnvironment";
import {ICancellationToken} from "../public/api/ICancellationToken";
import {ILogger} from "../public/api/ILogger";
import {IEvent} from "../public/api/IEvent";
import {IAggregatedResult, IPipelineResult} from "../public/api/IPipelineResult";
import {EJobState, EPipelineState} from "../public/api/EJobState";
import {EJobStatus} from "../public/api/EJobStatus";
import {ConfigError} from "../public/errors/ConfigError";
import {ErrorUtil} from "../public/utils/ErrorUtil";
import {IJobRunContext, runJob} from "./Job";
import {StepRunner} from "./StepRunner";
import {aggregate} from "./ResultAggregator";

const JOB_TRANSITIONS: Record<EJobState, EJobState[]> = {
    [EJobState.notStarted]: [EJobState.running],
    [EJobState.running]: [EJobState.passed, EJobState.failed],
    [EJobState.passed]: [],
    [EJobState.failed]: []
};

/**
 * Holds the results of a run. Every job writes its own result, once.
 */
export class ResultStore {
    private results: Map<string, IJobResult> = new Map();

    set(jobName: string, result: IJobResult): void {
        if (this.results.has(jobName)) {
            throw new Error("The result of job " + jobName + " was already recorded.");
        }
        this.results.set(jobName, result);
    }

    has(jobName: string): boolean {
        return this.results.has(jobName);
    }

    toMap(): Map<string, IJobResult> {
        return new Map(this.results);
    }
}

export interface IPipelineRunOptions {
    runId: string;
    pipelineName: string;
    event?: IEvent;

    /**
     * How many jobs may run at once. 0 means no limit.
     */
    maxParallel: number;

    defaultStepTimeoutMs: number;

    /**
     * Milliseconds the whole run may take. 0 means no deadline.
     */
    deadlineMs: number;

    stepRunner: StepRunner;
    token: ICancellationToken;
    logger: ILogger;

    /**
     * Returns the logger a job writes to. Defaults to the pipeline logger.
     */
    createJobLogger?: (jobName: string) => ILogger;

    onJobStateChange?: (jobName: string, state: EJobState) => void;
}

/**
 * Runs independent jobs concurrently and waits for all of them. A failing job never stops its siblings.
 */
export class Pipeline {
    private jobs: ReadonlyArray<IJobDefinition>;
    private options: IPipelineRunOptions;
    private pipelineState: EPipelineState = EPipelineState.notStarted;
    private jobStates: Map<string, EJobState> = new Map();

    constructor(jobs: ReadonlyArray<IJobDefinition>, options: IPipelineRunOptions) {
        const names: string[] = _.map(jobs, (job: IJobDefinition) => job.name);
        const duplicates: string[] = _.uniq(_.filter(names, (name: string, index: number) =>
            names.indexOf(name) !== index));
        if (duplicates.length > 0) {
            throw new ConfigError("Job names must be unique: " + duplicates.join(", "));
        }

        this.jobs = jobs;
        this.options = options;
        _.forEach(names, (name: string) => this.jobStates.set(name, EJobState.notStarted));
    }

    get state(): EPipelineState {
        return this.pipelineState;
    }

    getJobState(jobName: string): EJobState | undefined {
        return this.jobStates.get(jobName);
    }

    run(envFactory: IEnvironmentFactory, callback: async.AsyncResultCallback<IPipelineResult, Error>): void {
        if (this.pipelineState !== EPipelineState.notStarted) {
            callback(new Error("A pipeline can only be run once."));
            return;
        }

        const started: number = Date.now();
        const store: ResultStore = new ResultStore();
        const deadline: number | undefined = this.options.deadlineMs > 0 ? started + this.options.deadlineMs : undefined;
        const limit: number = this.options.maxParallel > 0 ? this.options.maxParallel : Math.max(this.jobs.length, 1);

        this.pipelineState = EPipelineState.running;
        this.options.logger.info(`Running ${this.jobs.length} job(s), at most ${limit} at a time.`);

        async.eachLimit(this.jobs.slice(), limit, (job: IJobDefinition, next: (err?: Error | null) => void) => {
            const logger: ILogger = this.options.createJobLogger
                ? this.options.createJobLogger(job.name) : this.options.logger;
            const context: IJobRunContext = {
                stepRunner: this.options.stepRunner,
                defaultStepTimeoutMs: this.options.defaultStepTimeoutMs,
                deadline: deadline,
                token: this.options.token,
                logger: logger
            };

            this.transition(job.name, EJobState.running);

            runJob(job, envFactory, context, (err?: Error | null, result?: IJobResult) => {
                const jobResult: IJobResult = result || {
                    jobName: job.name,
                    status: EJobStatus.failed,
                    steps: [],
                    error: err ? err.message : "The job ended without a result.",
                    durationMs: 0
                };

                try {
                    store.set(job.name, jobResult);
                    this.transition(job.name,
                        jobResult.status === EJobStatus.passed ? EJobState.passed : EJobState.failed);
                } catch (e) {
                    next(ErrorUtil.toError(e));
                    return;
                }

                // job failures are results; only bookkeeping errors stop the pipeline
                next();
            });
        }, (err?: Error | null) => {
            this.pipelineState = EPipelineState.completed;

            if (err) {
                callback(err);
                return;
            }

            const result: IAggregatedResult = aggregate(store.toMap(), _.map(this.jobs, "name"));
            this.options.logger.info(`Pipeline ${result.overallStatus} in ${Date.now() - started}ms.`);

            callback(null, {
                ...result,
                runId: this.options.runId,
                pipelineName: this.options.pipelineName,
                event: this.options.event,
                triggered: true,
                durationMs: Date.now() - started
            });
        });
    }

    private transition(jobName: string, to: EJobState): void {
        const from: EJobState | undefined = this.jobStates.get(jobName);
        if (from === undefined || !_.includes(JOB_TRANSITIONS[from], to)) {
            throw new Error(`Job ${jobName} cannot go from ${from} to ${to}.`);
        }

        this.jobStates.set(jobName, to);
        this.options.logger.info(`Job ${jobName}: ${to}`);

        if (this.options.onJobStateChange) {
            this.options.onJobStateChange(jobName, to);
        }
    }
}

/**
 * Runs every job and reports the aggregated result. Job names must be unique.
 */
export function runPipeline(jobs: ReadonlyArray<IJobDefinition>,
                            envFactory: IEnvironmentFactory,
                            options: IPipelineRunOptions,
                            callback: async.AsyncResultCallback<IPipelineResult, Error>): void {
    let pipeline: Pipeline;
    try {
        pipeline = new Pipeline(jobs, options);
    } catch (e) {
        callback(ErrorUtil.toError(e));
        return;
    }

    pipeline.run(envFactory, callback);
}
