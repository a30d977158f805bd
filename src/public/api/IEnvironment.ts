import async = require("async");
import _ = require("lodash");
import {IJobDefinition} from "./IJob";

/**
 * A fresh, job-exclusive execution context.
 */
export interface IEnvironment {
    readonly id: string;

    /**
     * Where the job's steps run, normally the checked out source.
     */
    readonly workingDir: string;

    /**
     * A directory that belongs to this environment only and goes away when it is released.
     */
    readonly scratchDir: string;

    readonly variables: Readonly<_.Dictionary<string>>;

    release(callback: async.ErrorCallback<Error>): void;
}

/**
 * Hands out isolated environments. Acquisition fails with a ProvisionError when the environment cannot be prepared.
 */
export interface IEnvironmentFactory {
    acquire(job: IJobDefinition, callback: async.AsyncResultCallback<IEnvironment, Error>): void;
}
