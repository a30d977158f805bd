import _ = require("lodash");
import async = require("async");
import {z} from "zod";
import {IReportSink} from "../../public/api/IReportSink";
import {ILogger} from "../../public/api/ILogger";
import {IPluginParams} from "../../public/options/IPluginParams";
import {ErrorUtil} from "../../public/utils/ErrorUtil";
import {OptionsUtil} from "../../public/utils/OptionsUtil";
import {IInvocationOutcome, StepRunner} from "../../internal/StepRunner";
import {currentProcessVariables} from "../../internal/Environment";

export const commandReportOptionsSchema = z.object({
    /**
     * Shell command that reads the report from stdin.
     */
    run: z.string().min(1),

    /**
     * Seconds the command may take.
     *
     * Default: 300
     */
    timeout: z.number().positive().default(300),

    env: z.record(z.string()).default({})
}).strict();

export type ICommandReportOptions = z.infer<typeof commandReportOptionsSchema>;

/**
 * Pipes the report into a command. The upload succeeded when the command exits with 0.
 */
export class CommandReportSink implements IReportSink {
    readonly name: string = "command";

    constructor(private readonly options: ICommandReportOptions,
                private readonly workingDir: string,
                private readonly stepRunner: StepRunner,
                private readonly logger: ILogger) {
    }

    upload(report: string, callback: async.AsyncResultCallback<boolean, Error>): void {
        this.stepRunner.runInvocation({kind: "shell", script: this.options.run}, {
            cwd: this.workingDir,
            variables: {...currentProcessVariables(), ...this.options.env},
            timeoutMs: this.options.timeout * 1000,
            input: report
        }, (err?: Error | null, outcome?: IInvocationOutcome) => {
            if (err || !outcome) {
                callback(err || new Error("The report command ended without an outcome."));
                return;
            }

            if (outcome.output) {
                this.logger.verbose(_.trimEnd(outcome.output));
            }
            if (outcome.exitCode !== 0) {
                this.logger.warn(`The report command exited with code ${outcome.exitCode}.`);
            }

            callback(null, outcome.exitCode === 0);
        });
    }
}

export function commandReport(params: IPluginParams, result: async.AsyncResultCallback<IReportSink, Error>): void {
    try {
        const options: ICommandReportOptions =
            OptionsUtil.parse(commandReportOptionsSchema, params.options, "the command report");
        result(null, new CommandReportSink(options, params.workingDir, new StepRunner(), params.logger));
    } catch (e) {
        result(ErrorUtil.toError(e));
    }
}
