import _ = require("lodash");
import {z} from "zod";
import {EEventKind} from "../public/api/EEventKind";
import {EReportFormat} from "../public/api/EReportFormat";
import {IInvocation, IStep} from "../public/api/IStep";
import {IJobDefinition} from "../public/api/IJob";
import {ITriggerRule} from "../public/api/ITriggerRule";
import {IPipelineDefinition, IPluginChoice, IToolchain} from "../public/api/IPipelineDefinition";
import {ConfigError} from "../public/errors/ConfigError";
import {validateTriggerRules} from "./Trigger";

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform((value: string | number | boolean) =>
    String(value));

const variables = z.record(scalar).default({});

const stringList = z.union([z.string(), z.array(z.string())])
    .transform((value: string | string[]) => _.isArray(value) ? value : [value]);

/**
 * A kind listed without branches (`push:` or `push: {}`) runs for every branch.
 */
const triggerSchema = z.object({
    branches: stringList.optional()
}).strict().nullable().optional();

const stepSchema = z.object({
    name: z.string().min(1),
    command: z.string().min(1).optional(),

    /**
     * A string is split on whitespace.
     */
    args: z.union([z.string(), z.array(scalar)]).optional(),

    run: z.string().min(1).optional(),

    /**
     * Seconds.
     */
    timeout: z.number().nonnegative().optional(),

    env: variables
}).strict().superRefine((step: {command?: string, run?: string, args?: unknown}, ctx: z.RefinementCtx) => {
    if (!!step.command === !!step.run) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "a step needs either a command or a run script, not both"
        });
    }
    if (step.run && step.args !== undefined) {
        ctx.addIssue({code: z.ZodIssueCode.custom, message: "args can only be given with a command"});
    }
});

const jobSchema = z.object({
    toolchain: z.string().min(1).optional(),
    env: variables,
    "env-var-files": z.object({
        dotenv: stringList.default([])
    }).strict().default({}),
    steps: z.array(stepSchema).min(1, "a job needs at least one step")
}).strict();

const toolchainSchema = z.object({
    env: variables,
    check: z.string().min(1).optional()
}).strict();

/**
 * `{pluginName: options}` with exactly one plugin.
 */
const pluginChoiceSchema = z.record(z.unknown()).refine((value: _.Dictionary<unknown>) => _.size(value) === 1, {
    message: "name exactly one plugin"
});

export const pipelineDocumentSchema = z.object({
    name: z.string().min(1).default("pipeline"),
    on: z.object({
        push: triggerSchema,
        pull_request: triggerSchema
    }).strict(),
    env: variables,
    toolchains: z.record(toolchainSchema).default({}),
    checkout: pluginChoiceSchema.default({local: {}}),
    runner: z.object({
        "max-parallel": z.number().int().nonnegative().default(0),
        "step-timeout": z.number().nonnegative().default(3600),
        deadline: z.number().nonnegative().default(0),
        "output-limit": z.number().int().positive().default(1024 * 1024),
        "out-dir": z.string().min(1).default(".jobline"),
        "keep-environments": z.boolean().default(false)
    }).strict().default({}),
    report: z.object({
        format: z.nativeEnum(EReportFormat).default(EReportFormat.text),
        strict: z.boolean().default(false),
        sink: pluginChoiceSchema.optional()
    }).strict().default({}),
    log: z.record(z.unknown()).default({}),
    plugins: stringList.default([]),
    jobs: z.record(jobSchema).refine((value: _.Dictionary<unknown>) => _.size(value) > 0, {
        message: "a pipeline needs at least one job"
    })
}).strict();

export type IPipelineDocument = z.infer<typeof pipelineDocumentSchema>;
type IStepDocument = z.infer<typeof stepSchema>;
type IJobDocument = z.infer<typeof jobSchema>;

/**
 * Validates a pipeline document and turns it into a frozen pipeline definition. Throws a ConfigError that lists every
 * problem found.
 */
export function buildPipelineDefinition(raw: unknown): IPipelineDefinition {
    const parsed: z.SafeParseReturnType<unknown, IPipelineDocument> = pipelineDocumentSchema.safeParse(raw);

    if (!parsed.success) {
        throw new ConfigError("The pipeline configuration is invalid:\n" + formatIssues(parsed.error));
    }

    const doc: IPipelineDocument = parsed.data;

    const triggers: ITriggerRule[] = [];
    _.forEach([EEventKind.push, EEventKind.pull_request], (kind: EEventKind) => {
        if (!_.has(doc.on, kind)) {
            return;
        }
        const trigger: {branches?: string[]} | null | undefined = doc.on[kind];
        triggers.push({kind: kind, branches: trigger && trigger.branches ? trigger.branches : ["**"]});
    });

    if (triggers.length === 0) {
        throw new ConfigError("The pipeline configuration is invalid:\non: name at least one event kind");
    }

    validateTriggerRules(triggers);

    const toolchains: _.Dictionary<IToolchain> = _.mapValues(doc.toolchains,
        (toolchain: z.infer<typeof toolchainSchema>, name: string) => ({
            name: name,
            env: toolchain.env,
            check: toolchain.check
        }));

    const jobs: IJobDefinition[] = _.map(_.toPairs(doc.jobs), ([name, job]: [string, IJobDocument]) => {
        if (job.toolchain && !toolchains[job.toolchain]) {
            throw new ConfigError(`The job ${name} uses the toolchain ${job.toolchain}, which is not defined.`);
        }

        return {
            name: name,
            toolchain: job.toolchain,
            env: job.env,
            envVarFiles: {dotenv: job["env-var-files"].dotenv},
            steps: _.map(job.steps, toStep)
        };
    });

    const definition: IPipelineDefinition = {
        name: doc.name,
        triggers: triggers,
        env: doc.env,
        toolchains: toolchains,
        checkout: toPluginChoice(doc.checkout),
        runner: {
            maxParallel: doc.runner["max-parallel"],
            stepTimeoutMs: doc.runner["step-timeout"] * 1000,
            deadlineMs: doc.runner.deadline * 1000,
            outputLimit: doc.runner["output-limit"],
            outDir: doc.runner["out-dir"],
            keepEnvironments: doc.runner["keep-environments"]
        },
        report: {
            format: doc.report.format,
            strict: doc.report.strict,
            sink: doc.report.sink ? toPluginChoice(doc.report.sink) : undefined
        },
        log: _.map(_.toPairs(doc.log), ([name, options]: [string, unknown]) => ({name: name, options: options})),
        plugins: doc.plugins,
        jobs: jobs
    };

    return deepFreeze(definition);
}

function toStep(step: IStepDocument): IStep {
    let invocation: IInvocation;

    if (step.command) {
        const args: string[] = _.isString(step.args)
            ? _.filter(step.args.split(/\s+/))
            : (step.args || []);
        invocation = {kind: "task", command: step.command, args: args};
    } else {
        invocation = {kind: "shell", script: step.run || ""};
    }

    return {
        name: step.name,
        invocation: invocation,
        timeoutMs: step.timeout === undefined ? undefined : step.timeout * 1000,
        env: step.env
    };
}

function toPluginChoice(value: _.Dictionary<unknown>): IPluginChoice {
    const name: string = _.keys(value)[0];
    return {name: name, options: value[name]};
}

function formatIssues(error: z.ZodError): string {
    return _.map(error.issues, (issue: z.ZodIssue) =>
        (issue.path.length > 0 ? issue.path.join(":") + ": " : "") + issue.message).join("\n");
}

function deepFreeze<T>(value: T): T {
    if (_.isObject(value) && !Object.isFrozen(value)) {
        Object.freeze(value);
        _.forEach(_.values(value), (child: unknown) => deepFreeze(child));
    }
    return value;
}
