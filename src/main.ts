#!/usr/bin/env node

import _ = require("lodash");
import async = require("async");
import yaml = require("js-yaml");
import yargs = require("yargs");
import fs = require("fs");
import path = require("path");
import uuid = require("uuid");
import {PathUtils} from "./public/utils/PathUtils";
import {ErrorUtil} from "./public/utils/ErrorUtil";
import {Config} from "./internal/Config";
import {PluginManager} from "./internal/PluginManager";
import {CancellationToken} from "./internal/CancellationToken";
import {renderReport} from "./internal/ResultAggregator";
import {IEvent} from "./public/api/IEvent";
import {IPipelineResult} from "./public/api/IPipelineResult";
import {EEventKind} from "./public/api/EEventKind";
import {EPipelineStatus} from "./public/api/EPipelineStatus";
import {EReportFormat} from "./public/api/EReportFormat";
import {CheckoutError, ConfigError} from "./public/errors";

export {JoblineError, ConfigError, CheckoutError, ProvisionError, UploadError} from "./public/errors";

// initialize default OOTB plugins.
PluginManager.initDefault();

export const DEFAULT_CONF_FILE: string = "jobline.yaml";

export enum EExitCode {
    passed = 0,
    failed = 1,
    configError = 2,
    checkoutError = 3,
    fatalError = 4
}

/**
 * The process exit code for the outcome of a run.
 */
export function getExitCode(err?: Error | null, result?: IPipelineResult): EExitCode {
    if (err instanceof ConfigError) {
        return EExitCode.configError;
    } else if (err instanceof CheckoutError) {
        return EExitCode.checkoutError;
    } else if (err || !result) {
        return EExitCode.fatalError;
    } else {
        return result.overallStatus === EPipelineStatus.passed ? EExitCode.passed : EExitCode.failed;
    }
}

/**
 * Validates the event given on the command line.
 */
export function parseEvent(kind: unknown, branch: unknown): IEvent {
    const kinds: string[] = _.values(EEventKind);
    const eventKind: EEventKind | undefined = _.find(_.values(EEventKind), (value: EEventKind) => value === kind);
    if (!eventKind) {
        throw new ConfigError(`The event kind must be one of ${kinds.join(", ")}, not ${String(kind)}.`);
    }
    if (!_.isString(branch) || !branch) {
        throw new ConfigError("The event needs a branch name.");
    }
    return {kind: eventKind, branch: branch};
}

export function catchUncaughtExceptions(): void {
    process.on("uncaughtException", (thrown: unknown): void => {
        let msg: string = "Unknown Error";
        if (thrown instanceof Error) {
            msg = thrown.name + ": " + thrown.message + "\n" + thrown.stack;
        } else if (thrown) {
            msg = String(thrown);
        }

        // tslint:disable-next-line
        console.error("Uncaught error:\n" + msg);
        process.exit(EExitCode.fatalError);
    });
}

export default class Jobline {
    private config: Config;
    private token: CancellationToken = new CancellationToken();

    static create(workingDirPath: string): Jobline {
        const runId: string = uuid.v4();
        return new Jobline("jobline-" + runId, runId, workingDirPath);
    }

    get runId(): string {
        return this.config.runId;
    }

    /**
     * Builds the configuration and runs the pipeline for the event.
     *
     * Make sure you have loaded all configurations necessary using the load* functions before calling this function.
     */
    execute(event: IEvent, callback: async.AsyncResultCallback<IPipelineResult, Error>): void {
        async.series([
            this.config.build.bind(this.config),
            (cb: async.AsyncResultCallback<IPipelineResult, Error>) => this.config.execute(event, this.token, cb)
        ], (err?: Error | null, results?: Array<IPipelineResult | undefined>) => {
            const result: IPipelineResult | undefined = results ? results[1] : undefined;
            if (err) {
                this.logError(err);
            }

            this.config.close(() => {
                if (err || !result) {
                    callback(err || new Error("The pipeline ended without a result."));
                } else {
                    callback(null, result);
                }
            });
        });
    }

    /**
     * Asks running steps to stop. Jobs that have not started yet finish as cancelled.
     */
    cancel(): void {
        this.token.cancel();
    }

    /**
     * Renders the result in the configured report format, or in the given one.
     */
    renderReport(result: IPipelineResult, format?: EReportFormat): string {
        return renderReport(result, format || this.config.definition.report.format);
    }

    /**
     * Loads `section:key` overrides from command line arguments, e.g. `--runner:max-parallel 2`. `--format` and
     * `--strict` are short for `--report:format` and `--report:strict`.
     */
    loadProcessEnvVars(argv: string[] = process.argv.slice(2)): Jobline {
        const args: _.Dictionary<unknown> = yargs(argv)
            .parserConfiguration({"camel-case-expansion": false, "dot-notation": false})
            .help(false)
            .version(false)
            .parseSync();

        const overrides: _.Dictionary<unknown> = {};
        _.forEach(args, (value: unknown, key: string) => {
            if (key === "format" || key === "strict") {
                overrides["report:" + key] = value;
            } else if (_.includes(key, ":")) {
                overrides[key] = value;
            }
        });

        return this.loadObject(overrides);
    }

    /**
     * Loads a configuration from a JSON file.
     */
    loadJsonFile(filePath: string, encoding: BufferEncoding = "utf8"): Jobline {
        filePath = PathUtils.getAsAbsolutePath(filePath, this.config.workingDir);
        this.loadObject(this.parseFile(filePath, (text: string) => JSON.parse(text), encoding));
        this.config.confFilePath = filePath;
        return this;
    }

    /**
     * Loads a configuration from a Yaml file.
     */
    loadYamlFile(filePath: string, encoding: BufferEncoding = "utf8"): Jobline {
        filePath = PathUtils.getAsAbsolutePath(filePath, this.config.workingDir);
        this.loadObject(this.parseFile(filePath, (text: string) => yaml.load(text), encoding));
        this.config.confFilePath = filePath;
        return this;
    }

    /**
     * Loads a configuration from an object. Later loads override earlier ones key by key.
     */
    loadObject(conf: object): Jobline {
        _.forEach(Object.entries(conf), ([key, value]: [string, unknown]) => {
            this.config.options.set(key, value);
        });
        return this;
    }

    private parseFile(filePath: string, parse: (text: string) => unknown, encoding: BufferEncoding): object {
        let parsed: unknown;
        try {
            parsed = parse(fs.readFileSync(filePath, encoding));
        } catch (e) {
            throw new ConfigError(`The configuration file ${filePath} cannot be loaded: ` +
                ErrorUtil.toError(e).message);
        }

        if (!_.isPlainObject(parsed) || !_.isObject(parsed)) {
            throw new ConfigError(`The configuration file ${filePath} does not hold an object.`);
        }
        return parsed;
    }

    private logError(err: Error): void {
        try {
            this.config.logger.error(err.message);
        } catch (e) {
            // the logger is not there when the configuration failed early
            // tslint:disable-next-line
            console.error(err.message);
        }
    }

    private constructor(namespace: string, runId: string, workingDir: string) {
        this.config = new Config(namespace, runId, workingDir);
    }
}

if (require.main === module) {
    catchUncaughtExceptions();

    const argv: _.Dictionary<unknown> = yargs(process.argv.slice(2))
        .usage("$0 --event <push|pull_request> --branch <name> [--conf <path>] [--section:key value ...]")
        .parserConfiguration({"camel-case-expansion": false, "dot-notation": false})
        .option("event", {type: "string", choices: _.values(EEventKind), demandOption: true})
        .option("branch", {type: "string", demandOption: true})
        .option("conf", {type: "string", describe: "The pipeline document (YAML or JSON)."})
        .option("format", {type: "string", choices: _.values(EReportFormat)})
        .option("strict", {type: "boolean", describe: "A failed report upload fails the pipeline."})
        .parseSync();

    let confFilePath: string | undefined = _.isString(argv["conf"]) ? argv["conf"] : undefined;
    if (!confFilePath) {
        // look for a jobline.yaml in the current directory and then upwards
        confFilePath = PathUtils.searchForPath(process.cwd(), DEFAULT_CONF_FILE);
    }

    let jobline: Jobline;
    let event: IEvent;
    try {
        if (!confFilePath) {
            throw new ConfigError(
                "No configuration file provided or found. Please provide a configuration file using the --conf argument.");
        }

        confFilePath = PathUtils.getAsAbsolutePath(confFilePath, process.cwd());
        event = parseEvent(argv["event"], argv["branch"]);
        jobline = Jobline.create(path.parse(confFilePath).dir);

        // the document first; command line overrides win
        const ext: string = path.parse(confFilePath).ext;
        if (ext === ".json") {
            jobline.loadJsonFile(confFilePath);
        } else {
            jobline.loadYamlFile(confFilePath);
        }
        jobline.loadProcessEnvVars();
    } catch (e) {
        const err: Error = ErrorUtil.toError(e);
        // tslint:disable-next-line
        console.error(err.message);
        process.exit(getExitCode(err));
    }

    const cancel: () => void = () => jobline.cancel();
    process.on("SIGINT", cancel);
    process.on("SIGTERM", cancel);

    jobline.execute(event, (err?: Error | null, result?: IPipelineResult) => {
        if (result) {
            process.stdout.write(jobline.renderReport(result));
        }

        process.exitCode = getExitCode(err, result);
    });
}
