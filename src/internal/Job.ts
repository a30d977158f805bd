import _ = require("lodash");
import async = require("async");
import {IJobDefinition} from "../public/api/IJob";
import {IJobResult} from "../public/api/IJobResult";
import {IStep} from "../public/api/IStep";
import {IStepResult} from "../public/api/IStepResult";
import {IEnvironment, IEnvironmentFactory} from "../public/api/IEnvironment";
import {ICancellationToken} from "../public/api/ICancellationToken";
import {ILogger} from "../public/api/ILogger";
import {EJobStatus} from "../public/api/EJobStatus";
import {CANCELLED_CODE, TIMEOUT_CODE} from "../public/api/ExitCodes";
import {ErrorUtil} from "../public/utils/ErrorUtil";
import {StepRunner} from "./StepRunner";

export interface IJobRunContext {
    stepRunner: StepRunner;

    /**
     * Timeout of steps that do not set their own, in milliseconds. 0 means no timeout.
     */
    defaultStepTimeoutMs: number;

    /**
     * Epoch milliseconds by which the whole pipeline has to be done. Undefined when there is no deadline.
     */
    deadline?: number;

    token: ICancellationToken;
    logger: ILogger;
}

/**
 * Runs the steps of one job, in declared order, inside an environment of its own.
 *
 * The first step that exits with a non-zero code fails the job; the steps after it are neither run nor recorded.
 * The environment is released exactly once, whatever happens.
 */
export class Job {
    readonly definition: IJobDefinition;

    private context: IJobRunContext;
    private results: IStepResult[] = [];
    private firstFailureIndex: number | undefined;

    constructor(definition: IJobDefinition, context: IJobRunContext) {
        this.definition = definition;
        this.context = context;
    }

    /**
     * The callback always receives a result; failures of any kind end up in it.
     */
    execute(envFactory: IEnvironmentFactory, callback: async.AsyncResultCallback<IJobResult, Error>): void {
        const started: number = Date.now();
        const logger: ILogger = this.context.logger;

        callback = _.once(callback);

        const done: (error?: Error | null) => void = (error?: Error | null) => {
            callback(null, this.toResult(started, error));
        };

        if (this.context.token.isCancellationRequested()) {
            logger.warn("Cancelled before the job started.");
            this.recordUnlaunched(0, CANCELLED_CODE, "Cancelled before start.");
            done();
            return;
        }

        try {
            envFactory.acquire(this.definition, (acquireError?: Error | null, env?: IEnvironment) => {
                if (acquireError || !env) {
                    const error: Error = acquireError || new Error("The environment factory returned no environment.");
                    logger.error("Could not acquire an environment: " + error.message);
                    done(error);
                    return;
                }

                const finish: (runError?: Error | null) => void = _.once((runError?: Error | null) => {
                    if (runError) {
                        logger.error("The job stopped unexpectedly: " + runError.message);
                    }

                    env.release((releaseError?: Error | null) => {
                        if (releaseError) {
                            logger.error("Could not release environment " + env.id + ": " + releaseError.message);
                        } else {
                            logger.debug("Released environment " + env.id);
                        }
                        done(runError);
                    });
                });

                try {
                    logger.info("Running in environment " + env.id);
                    this.runSteps(env, finish);
                } catch (e) {
                    finish(ErrorUtil.toError(e));
                }
            });
        } catch (e) {
            done(ErrorUtil.customize(ErrorUtil.toError(e), "The environment factory threw an error."));
        }
    }

    private runSteps(env: IEnvironment, callback: async.ErrorCallback<Error>): void {
        const steps: ReadonlyArray<IStep> = this.definition.steps;
        let index: number = 0;

        async.whilst(
            (cb: async.AsyncBooleanResultCallback<Error>) =>
                cb(null, this.firstFailureIndex === undefined && index < steps.length),
            (next: (err?: Error | null) => void) => {
                const current: number = index++;
                try {
                    this.runStep(steps[current], current, env, next);
                } catch (e) {
                    next(ErrorUtil.toError(e));
                }
            },
            (err?: Error | null) => callback(err));
    }

    private runStep(step: IStep, index: number, env: IEnvironment, next: (err?: Error | null) => void): void {
        const logger: ILogger = this.context.logger;

        if (this.context.token.isCancellationRequested()) {
            logger.warn(`Cancelled before step ${step.name}.`);
            this.recordUnlaunched(index, CANCELLED_CODE, "Cancelled before start.");
            next();
            return;
        }

        const timeoutMs: number | null = this.getEffectiveTimeout(step);
        if (timeoutMs === null) {
            logger.warn(`The pipeline deadline passed before step ${step.name}.`);
            this.recordUnlaunched(index, TIMEOUT_CODE, "The pipeline deadline passed before the step started.");
            next();
            return;
        }

        logger.info(`Step ${index + 1}/${this.definition.steps.length}: ${step.name}`);

        this.context.stepRunner.runStep(step, env, timeoutMs, this.context.token,
            (err?: Error | null, result?: IStepResult) => {
                if (err || !result) {
                    next(err || new Error("The step runner returned no result for " + step.name));
                    return;
                }

                if (result.output) {
                    logger.verbose(result.output);
                }

                this.record(index, result);

                if (result.exitCode === 0) {
                    logger.info(`Step ${step.name} passed in ${result.durationMs}ms.`);
                } else {
                    logger.error(`Step ${step.name} failed with exit code ${result.exitCode}.`);
                }

                next();
            });
    }

    /**
     * The step's own timeout (or the default) capped by the time left until the deadline. Returns 0 for no timeout
     * and null when the deadline has already passed.
     */
    private getEffectiveTimeout(step: IStep): number | null {
        const stepTimeout: number = _.isNumber(step.timeoutMs) ? step.timeoutMs : this.context.defaultStepTimeoutMs;

        if (this.context.deadline === undefined) {
            return stepTimeout;
        }

        const remaining: number = this.context.deadline - Date.now();
        if (remaining <= 0) {
            return null;
        }

        return stepTimeout > 0 ? Math.min(stepTimeout, remaining) : remaining;
    }

    private recordUnlaunched(index: number, exitCode: number, output: string): void {
        const step: IStep | undefined = this.definition.steps[index];
        if (step) {
            this.record(index, {stepName: step.name, exitCode: exitCode, durationMs: 0, output: output});
        }
    }

    private record(index: number, result: IStepResult): void {
        this.results.push(result);
        if (result.exitCode !== 0 && this.firstFailureIndex === undefined) {
            this.firstFailureIndex = index;
        }
    }

    private toResult(started: number, error?: Error | null): IJobResult {
        const failed: boolean = !!error || this.firstFailureIndex !== undefined ||
            (this.results.length === 0 && this.context.token.isCancellationRequested());

        return {
            jobName: this.definition.name,
            status: failed ? EJobStatus.failed : EJobStatus.passed,
            steps: this.results.slice(),
            firstFailureIndex: this.firstFailureIndex,
            error: error ? error.message : undefined,
            durationMs: Date.now() - started
        };
    }
}

/**
 * Runs the job and reports its terminal result.
 */
export function runJob(job: IJobDefinition,
                       envFactory: IEnvironmentFactory,
                       context: IJobRunContext,
                       callback: async.AsyncResultCallback<IJobResult, Error>): void {
    new Job(job, context).execute(envFactory, callback);
}
