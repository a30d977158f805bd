import _ = require("lodash");
import {IStep} from "./IStep";

/**
 * Where to find the files holding extra variables for a job's environment.
 */
export interface IEnvVarFiles {
    readonly dotenv: ReadonlyArray<string>;
}

/**
 * A Job is a named, independent unit of pipeline work. It owns its steps and runs them in order, in an environment
 * nobody else uses.
 */
export interface IJobDefinition {
    readonly name: string;

    /**
     * Name of the toolchain (from the `toolchains` section) the job's environment is provisioned with.
     */
    readonly toolchain?: string;

    readonly env: Readonly<_.Dictionary<string>>;
    readonly envVarFiles: IEnvVarFiles;
    readonly steps: ReadonlyArray<IStep>;
}
