import _ = require("lodash");

/**
 * Runs a tool directly with its ordered arguments; no shell is involved.
 */
export interface ITaskInvocation {
    readonly kind: "task";
    readonly command: string;
    readonly args: ReadonlyArray<string>;
}

/**
 * Runs a script through the platform shell.
 */
export interface IShellInvocation {
    readonly kind: "shell";
    readonly script: string;
}

export type IInvocation = ITaskInvocation | IShellInvocation;

/**
 * A single tool invocation inside a job.
 */
export interface IStep {
    readonly name: string;
    readonly invocation: IInvocation;

    /**
     * Overrides the runner's default step timeout, in milliseconds.
     */
    readonly timeoutMs?: number;

    /**
     * Variables added to the job environment for this step only.
     */
    readonly env: Readonly<_.Dictionary<string>>;
}
