import _ = require("lodash");
import async = require("async");
import os = require("os");
import {IEnvironment, IEnvironmentFactory} from "../public/api/IEnvironment";
import {IJobDefinition} from "../public/api/IJob";
import {ILogger} from "../public/api/ILogger";
import {IStep} from "../public/api/IStep";
import {currentProcessVariables} from "../internal/Environment";

/**
 * A step that runs a Node.js script in a child process.
 */
export function nodeStep(name: string, script: string, timeoutMs?: number): IStep {
    return {
        name: name,
        invocation: {kind: "task", command: process.execPath, args: ["-e", script]},
        timeoutMs: timeoutMs,
        env: {}
    };
}

export function jobOf(name: string, steps: IStep[]): IJobDefinition {
    return {name: name, env: {}, envVarFiles: {dotenv: []}, steps: steps};
}

export class TestLogger implements ILogger {
    lines: string[] = [];

    error(message: string): void {
        this.lines.push("error: " + message);
    }

    warn(message: string): void {
        this.lines.push("warn: " + message);
    }

    info(message: string): void {
        this.lines.push("info: " + message);
    }

    verbose(message: string): void {
        this.lines.push("verbose: " + message);
    }

    debug(message: string): void {
        this.lines.push("debug: " + message);
    }

    silly(message: string): void {
        this.lines.push("silly: " + message);
    }
}

export class FakeEnvironment implements IEnvironment {
    releaseCount: number = 0;

    constructor(readonly id: string,
                readonly workingDir: string = os.tmpdir(),
                readonly scratchDir: string = os.tmpdir(),
                readonly variables: Readonly<_.Dictionary<string>> = currentProcessVariables()) {
    }

    release(callback: async.ErrorCallback<Error>): void {
        this.releaseCount++;
        callback(null);
    }
}

/**
 * Hands out FakeEnvironments and remembers them. Jobs named in `failing` get a ProvisionError-like error instead.
 */
export class FakeEnvironmentFactory implements IEnvironmentFactory {
    environments: FakeEnvironment[] = [];
    acquired: string[] = [];

    constructor(private readonly failing: _.Dictionary<Error> = {}) {
    }

    acquire(job: IJobDefinition, callback: async.AsyncResultCallback<IEnvironment, Error>): void {
        this.acquired.push(job.name);

        const error: Error | undefined = this.failing[job.name];
        if (error) {
            callback(error);
            return;
        }

        const env: FakeEnvironment = new FakeEnvironment(job.name + "-env");
        this.environments.push(env);
        callback(null, env);
    }
}
