import _ = require("lodash");
import async = require("async");
import mkdirp = require("mkdirp");
import winston = require("winston");
import {PluginManager} from "./PluginManager";
import {Plugins} from "./Plugins";
import {SimpleStore} from "./SimpleStore";
import {resolveConfigVars} from "./ConfigResolver";
import {buildPipelineDefinition} from "./PipelineSchema";
import {createLogger} from "./Logging";
import {shouldRun} from "./Trigger";
import {StepRunner} from "./StepRunner";
import {currentProcessVariables, ScratchEnvironmentFactory} from "./Environment";
import {runPipeline} from "./Pipeline";
import {aggregate, applyUploadOutcome, renderReport, skipAll} from "./ResultAggregator";
import {IConfig} from "../public/api/IConfig";
import {IEvent} from "../public/api/IEvent";
import {ILogger} from "../public/api/ILogger";
import {ICancellationToken} from "../public/api/ICancellationToken";
import {ICheckoutProvider} from "../public/api/ICheckoutProvider";
import {IReportSink} from "../public/api/IReportSink";
import {IJobDefinition} from "../public/api/IJob";
import {IPipelineDefinition, IPluginChoice} from "../public/api/IPipelineDefinition";
import {IPipelineResult, IUploadOutcome} from "../public/api/IPipelineResult";
import {IPluginParams} from "../public/options/IPluginParams";
import {CheckoutError} from "../public/errors/CheckoutError";
import {ConfigError} from "../public/errors/ConfigError";
import {UploadError} from "../public/errors/UploadError";
import {ErrorUtil} from "../public/utils/ErrorUtil";
import {PathUtils} from "../public/utils/PathUtils";

/**
 * The sections of a pipeline document. Variables are resolved inside all of them.
 */
const DOCUMENT_SECTIONS: string[] = [
    "name", "on", "env", "toolchains", "checkout", "runner", "report", "log", "plugins", "jobs"
];

export class Config implements IConfig {

    /**
     * Stores the jobline configuration.
     */
    options: SimpleStore;

    runId: string;

    /**
     * This is the directory which we resolve all other relative directories with.
     */
    workingDir: string;

    /**
     * Absolute `runner:out-dir`. Holds the scratch environments and default log and report files.
     */
    outDir: string = "";

    confFilePath?: string;

    private pipelineDefinition?: IPipelineDefinition;
    private rootLogger?: winston.Logger;
    private checkoutProvider?: ICheckoutProvider;
    private reportSink?: IReportSink;

    constructor(namespace: string, runId: string, workingDir: string) {
        this.options = new SimpleStore(namespace);
        this.runId = runId;
        this.workingDir = workingDir;
    }

    get definition(): IPipelineDefinition {
        if (!this.pipelineDefinition) {
            throw new Error("The configuration has not been built yet.");
        }
        return this.pipelineDefinition;
    }

    get logger(): ILogger {
        return this.getRootLogger();
    }

    /**
     * Resolves variables, validates the document and sets up the plugins it chooses. Errors in the document are
     * ConfigErrors.
     */
    build(callback: async.ErrorCallback<Error>): void {
        async.series([
            this.resolveVars.bind(this),
            this.buildDefinition.bind(this),
            this.initializePaths.bind(this),
            this.requirePlugins.bind(this),
            this.createLogger.bind(this),
            this.createCheckoutProvider.bind(this),
            this.createReportSink.bind(this)
        ], (err?: Error | null) => callback(err));
    }

    /**
     * Runs the pipeline for the event: trigger evaluation, checkout, the jobs, and the report upload. Only config and
     * checkout problems end in an error; everything else is part of the result.
     */
    execute(event: IEvent, token: ICancellationToken, callback: async.AsyncResultCallback<IPipelineResult, Error>): void {
        let definition: IPipelineDefinition;
        let logger: winston.Logger;
        let checkoutProvider: ICheckoutProvider;
        try {
            definition = this.definition;
            logger = this.getRootLogger();
            checkoutProvider = this.getCheckoutProvider();
        } catch (e) {
            callback(ErrorUtil.toError(e));
            return;
        }

        const started: number = Date.now();
        const jobNames: string[] = _.map(definition.jobs, (job: IJobDefinition) => job.name);

        if (!shouldRun(event, definition.triggers)) {
            logger.info(`No trigger of ${definition.name} matches ${event.kind} to ${event.branch}; skipping all jobs.`);
            callback(null, {
                ...aggregate(skipAll(definition.jobs), jobNames),
                runId: this.runId,
                pipelineName: definition.name,
                event: event,
                triggered: false,
                durationMs: Date.now() - started
            });
            return;
        }

        logger.info(`Running ${definition.name} for ${event.kind} to ${event.branch} (run ${this.runId}).`);

        checkoutProvider.checkout(event.branch, (checkoutError?: Error | null, sourceDir?: string) => {
            if (checkoutError || !sourceDir) {
                callback(checkoutError instanceof CheckoutError ? checkoutError : new CheckoutError(
                    `The ${checkoutProvider.name} checkout of ${event.branch} failed: ` +
                    (checkoutError ? checkoutError.message : "no directory was returned")));
                return;
            }

            logger.info("Source checked out in " + sourceDir);

            const stepRunner: StepRunner = new StepRunner({outputLimit: definition.runner.outputLimit});
            const envFactory: ScratchEnvironmentFactory = new ScratchEnvironmentFactory({
                runId: this.runId,
                workingDir: sourceDir,
                outDir: this.outDir,
                baseVariables: {...currentProcessVariables(), ...definition.env},
                toolchains: definition.toolchains,
                keepEnvironments: definition.runner.keepEnvironments,
                stepRunner: stepRunner,
                logger: logger
            });

            runPipeline(definition.jobs, envFactory, {
                runId: this.runId,
                pipelineName: definition.name,
                event: event,
                maxParallel: definition.runner.maxParallel,
                defaultStepTimeoutMs: definition.runner.stepTimeoutMs,
                deadlineMs: definition.runner.deadlineMs,
                stepRunner: stepRunner,
                token: token,
                logger: logger,
                createJobLogger: (jobName: string) => this.createJobLogger(jobName)
            }, (err?: Error | null, result?: IPipelineResult) => {
                if (err || !result) {
                    callback(err || new Error("The pipeline ended without a result."));
                    return;
                }

                this.upload(result, callback);
            });
        });
    }

    /**
     * A logger whose lines are labelled `<pipeline>/<run id>/<job>`.
     */
    createJobLogger(jobName: string): ILogger {
        return this.getRootLogger().child({label: `${this.definition.name}/${this.runId}/${jobName}`});
    }

    /**
     * Waits until every transport has written what it was given.
     */
    close(callback: () => void): void {
        if (!this.rootLogger) {
            callback();
            return;
        }

        const logger: winston.Logger = this.rootLogger;
        this.rootLogger = undefined;
        logger.on("finish", () => callback());
        logger.end();
    }

    private upload(result: IPipelineResult, callback: async.AsyncResultCallback<IPipelineResult, Error>): void {
        const sink: IReportSink | undefined = this.reportSink;
        if (!sink) {
            callback(null, result);
            return;
        }

        const logger: ILogger = this.getRootLogger();
        const report: string = renderReport(result, this.definition.report.format);
        const strict: boolean = this.definition.report.strict;

        const finish: (outcome: IUploadOutcome) => void = (outcome: IUploadOutcome) => {
            if (outcome.ok) {
                logger.info("Report uploaded to " + sink.name);
            } else {
                const error: UploadError = new UploadError(
                    `The report could not be uploaded to ${sink.name}: ${outcome.error}`);
                if (strict) {
                    logger.error(error.message);
                } else {
                    logger.warn(error.message);
                }
            }
            callback(null, applyUploadOutcome(result, outcome, strict));
        };

        try {
            sink.upload(report, (err?: Error | null, accepted?: boolean) => {
                if (err) {
                    finish({sink: sink.name, ok: false, error: err.message});
                } else if (accepted !== true) {
                    finish({sink: sink.name, ok: false, error: "the sink did not accept the report"});
                } else {
                    finish({sink: sink.name, ok: true});
                }
            });
        } catch (e) {
            finish({sink: sink.name, ok: false, error: ErrorUtil.toError(e).message});
        }
    }

    private resolveVars(callback: async.ErrorCallback<Error>): void {
        resolveConfigVars(this.options, DOCUMENT_SECTIONS, callback);
    }

    private buildDefinition(callback: async.ErrorCallback<Error>): void {
        try {
            this.pipelineDefinition = buildPipelineDefinition(_.cloneDeep(this.options.asObject()));
        } catch (e) {
            callback(ErrorUtil.toError(e));
            return;
        }
        callback(null);
    }

    private initializePaths(callback: async.ErrorCallback<Error>): void {
        this.outDir = PathUtils.getAsAbsolutePath(this.definition.runner.outDir, this.workingDir);

        mkdirp(this.outDir).then(
            () => callback(null),
            (err: Error) => callback(ErrorUtil.customize(err, "Could not create the output directory " + this.outDir)));
    }

    private requirePlugins(callback: async.ErrorCallback<Error>): void {
        PluginManager.requirePlugins(this.definition.plugins, callback);
    }

    private createLogger(callback: async.ErrorCallback<Error>): void {
        createLogger(this.definition.log, {
            label: `${this.definition.name}/${this.runId}`,
            workingDir: this.workingDir,
            outDir: this.outDir
        }, (err?: Error | null, logger?: winston.Logger) => {
            this.rootLogger = logger;
            callback(err);
        });
    }

    private createCheckoutProvider(callback: async.ErrorCallback<Error>): void {
        const choice: IPluginChoice = this.definition.checkout;
        const plugin: IPluginType<ICheckoutProvider> | undefined = Plugins.checkout[choice.name];
        if (!plugin) {
            callback(new ConfigError("There is no checkout plugin called " + choice.name + ". Known plugins: " +
                _.keys(Plugins.checkout).join(", ")));
            return;
        }

        this.runPlugin(plugin, choice, (err?: Error | null, provider?: ICheckoutProvider) => {
            this.checkoutProvider = provider;
            callback(err);
        });
    }

    private createReportSink(callback: async.ErrorCallback<Error>): void {
        const choice: IPluginChoice | undefined = this.definition.report.sink;
        if (!choice) {
            callback(null);
            return;
        }

        const plugin: IPluginType<IReportSink> | undefined = Plugins.report[choice.name];
        if (!plugin) {
            callback(new ConfigError("There is no report plugin called " + choice.name + ". Known plugins: " +
                _.keys(Plugins.report).join(", ")));
            return;
        }

        this.runPlugin(plugin, choice, (err?: Error | null, sink?: IReportSink) => {
            this.reportSink = sink;
            callback(err);
        });
    }

    private runPlugin<T>(plugin: IPluginType<T>,
                         choice: IPluginChoice,
                         callback: async.AsyncResultCallback<T, Error>): void {
        const params: IPluginParams = {
            options: choice.options,
            workingDir: this.workingDir,
            outDir: this.outDir,
            runId: this.runId,
            logger: this.getRootLogger()
        };

        try {
            plugin(params, (err?: Error | null, instance?: T) => {
                if (err) {
                    callback(ErrorUtil.customize(err, "The plugin " + choice.name + " could not be created."));
                } else if (instance === undefined) {
                    callback(new Error("The plugin " + choice.name + " returned nothing."));
                } else {
                    callback(null, instance);
                }
            });
        } catch (e) {
            callback(ErrorUtil.customize(ErrorUtil.toError(e), "The plugin " + choice.name + " could not be created."));
        }
    }

    private getRootLogger(): winston.Logger {
        if (!this.rootLogger) {
            throw new Error("The configuration has not been built yet.");
        }
        return this.rootLogger;
    }

    private getCheckoutProvider(): ICheckoutProvider {
        if (!this.checkoutProvider) {
            throw new Error("The configuration has not been built yet.");
        }
        return this.checkoutProvider;
    }
}

type IPluginType<T> = (params: IPluginParams, result: async.AsyncResultCallback<T, Error>) => void;
