import _ = require("lodash");
import async = require("async");
import dotenv = require("dotenv");
import fs = require("fs");
import mkdirp = require("mkdirp");
import path = require("path");
import getSlug = require("speakingurl");
import uuid = require("uuid");
import {IEnvironment, IEnvironmentFactory} from "../public/api/IEnvironment";
import {IJobDefinition} from "../public/api/IJob";
import {IToolchain} from "../public/api/IPipelineDefinition";
import {ILogger} from "../public/api/ILogger";
import {ProvisionError} from "../public/errors/ProvisionError";
import {ErrorUtil} from "../public/utils/ErrorUtil";
import {PathUtils} from "../public/utils/PathUtils";
import {IInvocationOutcome, StepRunner} from "./StepRunner";

export const TOOLCHAIN_CHECK_TIMEOUT_MS: number = 5 * 60 * 1000;

export interface IScratchEnvironmentOptions {
    runId: string;

    /**
     * Where the steps run: the checked out source.
     */
    workingDir: string;

    /**
     * Absolute directory the scratch directories are created in.
     */
    outDir: string;

    /**
     * The variables every environment starts from: the process environment overlaid with the pipeline's `env`.
     */
    baseVariables: Readonly<_.Dictionary<string>>;

    toolchains: Readonly<_.Dictionary<IToolchain>>;
    keepEnvironments: boolean;
    stepRunner: StepRunner;
    logger: ILogger;
}

/**
 * Returns the variables of the current process, without the unset ones.
 */
export function currentProcessVariables(): _.Dictionary<string> {
    const retVal: _.Dictionary<string> = {};
    _.forEach(process.env, (value: string | undefined, key: string) => {
        if (_.isString(value)) {
            retVal[key] = value;
        }
    });
    return retVal;
}

class ScratchEnvironment implements IEnvironment {
    private released: boolean = false;

    constructor(readonly id: string,
                readonly workingDir: string,
                readonly scratchDir: string,
                readonly variables: Readonly<_.Dictionary<string>>,
                private readonly keep: boolean) {
    }

    release(callback: async.ErrorCallback<Error>): void {
        if (this.released) {
            callback(new Error("The environment " + this.id + " was already released."));
            return;
        }

        this.released = true;

        if (this.keep) {
            callback(null);
            return;
        }

        fs.rm(this.scratchDir, {recursive: true, force: true}, (err: NodeJS.ErrnoException | null) => {
            callback(err ? ErrorUtil.customize(err, "Could not remove " + this.scratchDir) : null);
        });
    }
}

/**
 * Gives every job a scratch directory of its own and a set of variables made of, from lowest to highest precedence:
 * the base variables, the job's toolchain, the job's dotenv files, the job's `env` and the JOBLINE_* variables.
 *
 * A job's toolchain `check` command must succeed in the new environment, otherwise acquisition fails with a
 * ProvisionError.
 */
export class ScratchEnvironmentFactory implements IEnvironmentFactory {

    constructor(private readonly options: IScratchEnvironmentOptions) {
    }

    acquire(job: IJobDefinition, callback: async.AsyncResultCallback<IEnvironment, Error>): void {
        callback = _.once(callback);

        let toolchain: IToolchain | undefined;
        if (job.toolchain) {
            toolchain = this.options.toolchains[job.toolchain];
            if (!toolchain) {
                callback(new ProvisionError(`The toolchain ${job.toolchain} of job ${job.name} is not defined.`));
                return;
            }
        }

        const id: string = (getSlug(job.name) || "job") + "-" + uuid.v4().substring(0, 8);
        const scratchDir: string = path.resolve(this.options.outDir, this.options.runId, id);

        let fileVariables: _.Dictionary<string>;
        try {
            fileVariables = this.loadEnvVarFiles(job);
        } catch (e) {
            callback(e instanceof ProvisionError ? e : new ProvisionError(ErrorUtil.toError(e).message));
            return;
        }

        const variables: _.Dictionary<string> = {
            ...this.options.baseVariables,
            ...(toolchain ? toolchain.env : {}),
            ...fileVariables,
            ...job.env,
            JOBLINE: "true",
            JOBLINE_RUN_ID: this.options.runId,
            JOBLINE_JOB: job.name,
            JOBLINE_ENVIRONMENT_ID: id,
            JOBLINE_WORKSPACE: this.options.workingDir,
            JOBLINE_SCRATCH_DIR: scratchDir,
            ...(toolchain ? {JOBLINE_TOOLCHAIN: toolchain.name} : {})
        };

        const env: ScratchEnvironment = new ScratchEnvironment(
            id, this.options.workingDir, scratchDir, Object.freeze(variables), this.options.keepEnvironments);

        mkdirp(scratchDir).then(
            () => {
                this.options.logger.debug("Created environment " + id + " in " + scratchDir);
                this.checkToolchain(env, toolchain, callback);
            },
            (err: Error) => {
                callback(new ProvisionError("Could not create the scratch directory " + scratchDir + ": " +
                    err.message));
            });
    }

    private checkToolchain(env: ScratchEnvironment,
                           toolchain: IToolchain | undefined,
                           callback: async.AsyncResultCallback<IEnvironment, Error>): void {
        if (!toolchain || !toolchain.check) {
            callback(null, env);
            return;
        }

        const check: string = toolchain.check;
        const toolchainName: string = toolchain.name;
        this.options.stepRunner.runInvocation({kind: "shell", script: check}, {
            cwd: env.workingDir,
            variables: env.variables,
            timeoutMs: TOOLCHAIN_CHECK_TIMEOUT_MS
        }, (err?: Error | null, outcome?: IInvocationOutcome) => {
            if (!err && outcome && outcome.exitCode === 0) {
                this.options.logger.verbose("Toolchain " + toolchainName + ": " + _.trim(outcome.output));
                callback(null, env);
                return;
            }

            const details: string = outcome ? `exit code ${outcome.exitCode}\n${outcome.output}` :
                (err ? err.message : "no outcome");
            const provisionError: ProvisionError = new ProvisionError(
                `The check "${check}" of toolchain ${toolchainName} failed: ${details}`);

            // the environment never reaches the job, so it is released here
            env.release((releaseError?: Error | null) => {
                if (releaseError) {
                    this.options.logger.warn(releaseError.message);
                }
                callback(provisionError);
            });
        });
    }

    private loadEnvVarFiles(job: IJobDefinition): _.Dictionary<string> {
        const retVal: _.Dictionary<string> = {};

        _.forEach(job.envVarFiles.dotenv, (filename: string) => {
            const fullpath: string = PathUtils.getAsAbsolutePath(filename, this.options.workingDir);
            try {
                _.assign(retVal, dotenv.parse(fs.readFileSync(fullpath, "utf8")));
            } catch (e) {
                throw new ProvisionError("There was a problem in loading the environment variables of job " +
                    job.name + ". The file " + fullpath + " failed to load: " + ErrorUtil.toError(e).message);
            }
        });

        return retVal;
    }
}
