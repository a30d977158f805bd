import _ = require("lodash");
import {ITriggerRule} from "./ITriggerRule";
import {IJobDefinition} from "./IJob";
import {EReportFormat} from "./EReportFormat";

/**
 * Variables and an optional sanity check that make up a named toolchain.
 */
export interface IToolchain {
    readonly name: string;
    readonly env: Readonly<_.Dictionary<string>>;

    /**
     * Shell command that must exit with 0 inside a freshly provisioned environment.
     */
    readonly check?: string;
}

/**
 * A plugin chosen by name together with the options it is given.
 */
export interface IPluginChoice {
    readonly name: string;
    readonly options: unknown;
}

export interface IRunnerOptions {
    /**
     * How many jobs may run at once. 0 means no limit.
     */
    readonly maxParallel: number;

    /**
     * Default timeout of a step in milliseconds. 0 means no timeout.
     */
    readonly stepTimeoutMs: number;

    /**
     * Time the whole pipeline may take in milliseconds. 0 means no deadline.
     */
    readonly deadlineMs: number;

    /**
     * How many bytes of output are kept per step.
     */
    readonly outputLimit: number;

    /**
     * Where the scratch directories of the job environments are created.
     */
    readonly outDir: string;

    /**
     * Leaves the scratch directories behind when environments are released.
     */
    readonly keepEnvironments: boolean;
}

export interface IReportOptions {
    readonly format: EReportFormat;

    /**
     * When set, a failed upload fails the pipeline even when every job passed.
     */
    readonly strict: boolean;

    readonly sink?: IPluginChoice;
}

/**
 * The loaded, validated and immutable pipeline document.
 */
export interface IPipelineDefinition {
    readonly name: string;
    readonly triggers: ReadonlyArray<ITriggerRule>;
    readonly env: Readonly<_.Dictionary<string>>;
    readonly toolchains: Readonly<_.Dictionary<IToolchain>>;
    readonly checkout: IPluginChoice;
    readonly runner: IRunnerOptions;
    readonly report: IReportOptions;
    readonly log: ReadonlyArray<IPluginChoice>;
    readonly plugins: ReadonlyArray<string>;

    /**
     * In declaration order.
     */
    readonly jobs: ReadonlyArray<IJobDefinition>;
}
