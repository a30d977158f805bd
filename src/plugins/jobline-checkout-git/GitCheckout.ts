import _ = require("lodash");
import async = require("async");
import fs = require("fs");
import mkdirp = require("mkdirp");
import path = require("path");
import {z} from "zod";
import {ICheckoutProvider} from "../../public/api/ICheckoutProvider";
import {ILogger} from "../../public/api/ILogger";
import {IPluginParams} from "../../public/options/IPluginParams";
import {CheckoutError} from "../../public/errors/CheckoutError";
import {ErrorUtil} from "../../public/utils/ErrorUtil";
import {OptionsUtil} from "../../public/utils/OptionsUtil";
import {PathUtils} from "../../public/utils/PathUtils";
import {IInvocationOutcome, StepRunner} from "../../internal/StepRunner";
import {currentProcessVariables} from "../../internal/Environment";

export const gitCheckoutOptionsSchema = z.object({
    url: z.string().min(1),

    /**
     * Where the clone goes, relative to the working directory.
     *
     * Default: ${runner:out-dir}/<run id>/source
     */
    path: z.string().min(1).optional(),

    /**
     * Seconds the clone may take.
     *
     * Default: 600
     */
    timeout: z.number().positive().default(600),

    /**
     * The git executable.
     */
    command: z.string().min(1).default("git")
}).strict();

export type IGitCheckoutOptions = z.infer<typeof gitCheckoutOptionsSchema>;

/**
 * Makes a shallow clone of one branch: `git clone --depth 1 --branch <ref> <url> <path>`.
 */
export class GitCheckout implements ICheckoutProvider {
    readonly name: string = "git";

    constructor(private readonly options: IGitCheckoutOptions,
                readonly destination: string,
                private readonly stepRunner: StepRunner,
                private readonly logger: ILogger) {
    }

    checkout(ref: string, callback: async.AsyncResultCallback<string, Error>): void {
        if (fs.existsSync(this.destination) && fs.readdirSync(this.destination).length > 0) {
            callback(new CheckoutError(`The checkout directory ${this.destination} is not empty.`));
            return;
        }

        const args: string[] = ["clone", "--depth", "1", "--branch", ref, this.options.url, this.destination];
        this.logger.info(`Cloning ${this.options.url} (${ref}) into ${this.destination}`);

        this.stepRunner.runInvocation({kind: "task", command: this.options.command, args: args}, {
            cwd: path.dirname(this.destination),
            variables: {...currentProcessVariables(), GIT_TERMINAL_PROMPT: "0"},
            timeoutMs: this.options.timeout * 1000
        }, (err?: Error | null, outcome?: IInvocationOutcome) => {
            if (err || !outcome) {
                callback(new CheckoutError(`Could not clone ${this.options.url}: ` +
                    (err ? err.message : "the clone ended without an outcome")));
            } else if (outcome.exitCode !== 0) {
                callback(new CheckoutError(`Could not clone ${this.options.url} at ${ref} ` +
                    `(exit code ${outcome.exitCode}):\n${_.trim(outcome.output)}`));
            } else {
                callback(null, this.destination);
            }
        });
    }
}

export function gitCheckout(params: IPluginParams, result: async.AsyncResultCallback<ICheckoutProvider, Error>): void {
    try {
        const options: IGitCheckoutOptions = OptionsUtil.parse(gitCheckoutOptionsSchema, params.options,
            "the git checkout");
        const destination: string = options.path
            ? PathUtils.getAsAbsolutePath(options.path, params.workingDir)
            : path.resolve(params.outDir, params.runId, "source");

        mkdirp.sync(path.dirname(destination));
        result(null, new GitCheckout(options, destination, new StepRunner(), params.logger));
    } catch (e) {
        result(ErrorUtil.toError(e));
    }
}
