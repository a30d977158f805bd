import _ = require("lodash");
import async = require("async");
import os = require("os");
import {ChildProcess, spawn, SpawnOptions} from "child_process";
import {IStep, IInvocation} from "../public/api/IStep";
import {IStepResult} from "../public/api/IStepResult";
import {IEnvironment} from "../public/api/IEnvironment";
import {ICancellationToken} from "../public/api/ICancellationToken";
import {CANCELLED_CODE, SPAWN_FAILURE_CODE, TIMEOUT_CODE} from "../public/api/ExitCodes";

export const DEFAULT_OUTPUT_LIMIT: number = 1024 * 1024;
export const DEFAULT_KILL_GRACE_MS: number = 5000;

export interface IStepRunnerOptions {
    /**
     * How many bytes of combined output are kept. Older output is dropped first.
     */
    outputLimit?: number;

    /**
     * How long a terminated process gets to exit after SIGTERM before it is sent SIGKILL.
     */
    killGraceMs?: number;
}

export interface IInvocationOptions {
    cwd: string;
    variables: Readonly<_.Dictionary<string>>;

    /**
     * 0 or less means no timeout.
     */
    timeoutMs: number;

    token?: ICancellationToken;

    /**
     * Written to the process's stdin, which is then closed.
     */
    input?: string;
}

export interface IInvocationOutcome {
    exitCode: number;
    output: string;
    durationMs: number;
}

/**
 * Launches step invocations and waits for them to end, one process per call.
 */
export class StepRunner {
    readonly outputLimit: number;
    readonly killGraceMs: number;

    constructor(options: IStepRunnerOptions = {}) {
        this.outputLimit = options.outputLimit || DEFAULT_OUTPUT_LIMIT;
        this.killGraceMs = _.isNumber(options.killGraceMs) ? options.killGraceMs : DEFAULT_KILL_GRACE_MS;
    }

    /**
     * Runs the step inside the environment. The result's exit code is TIMEOUT_CODE when the timeout was hit and
     * CANCELLED_CODE when the token was cancelled; the callback never receives an error.
     */
    runStep(step: IStep,
            env: IEnvironment,
            timeoutMs: number,
            token: ICancellationToken | undefined,
            callback: async.AsyncResultCallback<IStepResult, Error>): void {
        this.runInvocation(step.invocation, {
            cwd: env.workingDir,
            variables: _.assign({}, env.variables, step.env),
            timeoutMs: timeoutMs,
            token: token
        }, (err?: Error | null, outcome?: IInvocationOutcome) => {
            callback(null, {
                stepName: step.name,
                exitCode: outcome ? outcome.exitCode : SPAWN_FAILURE_CODE,
                durationMs: outcome ? outcome.durationMs : 0,
                output: outcome ? outcome.output : (err ? err.message : "")
            });
        });
    }

    runInvocation(invocation: IInvocation,
                  options: IInvocationOptions,
                  callback: async.AsyncResultCallback<IInvocationOutcome, Error>): void {
        const started: number = Date.now();
        const output: OutputBuffer = new OutputBuffer(this.outputLimit);

        if (options.token && options.token.isCancellationRequested()) {
            callback(null, {exitCode: CANCELLED_CODE, output: "Cancelled before start.", durationMs: 0});
            return;
        }

        const spawnOptions: SpawnOptions = {
            cwd: options.cwd,
            env: _.assign({}, options.variables),
            stdio: [_.isString(options.input) ? "pipe" : "ignore", "pipe", "pipe"],
            // a group of its own lets us terminate whatever the command started, too
            detached: process.platform !== "win32",
            windowsHide: true
        };

        let child: ChildProcess;
        try {
            child = invocation.kind === "task"
                ? spawn(invocation.command, _.toArray(invocation.args), spawnOptions)
                : spawn(invocation.script, _.assign({shell: true}, spawnOptions));
        } catch (e) {
            const message: string = e instanceof Error ? e.message : String(e);
            callback(null, {exitCode: SPAWN_FAILURE_CODE, output: message, durationMs: Date.now() - started});
            return;
        }

        let reason: "timeout" | "cancel" | undefined;
        let timeoutTimer: NodeJS.Timeout | undefined;
        let killTimer: NodeJS.Timeout | undefined;
        let unregisterCancel: () => void = _.noop;

        const finish: (exitCode: number) => void = _.once((exitCode: number) => {
            if (timeoutTimer) {
                clearTimeout(timeoutTimer);
            }
            if (killTimer) {
                clearTimeout(killTimer);
            }
            unregisterCancel();

            callback(null, {exitCode: exitCode, output: output.toString(), durationMs: Date.now() - started});
        });

        const terminate: (why: "timeout" | "cancel") => void = (why: "timeout" | "cancel") => {
            if (reason) {
                return;
            }

            reason = why;
            output.append(Buffer.from(why === "timeout"
                ? `\nTimed out after ${options.timeoutMs}ms.\n`
                : "\nCancelled.\n"));

            killProcess(child, "SIGTERM");
            killTimer = setTimeout(() => killProcess(child, "SIGKILL"), this.killGraceMs);
        };

        if (child.stdout) {
            child.stdout.on("data", (chunk: Buffer) => output.append(chunk));
        }
        if (child.stderr) {
            child.stderr.on("data", (chunk: Buffer) => output.append(chunk));
        }
        if (child.stdin) {
            // the process may exit without reading its input
            child.stdin.on("error", (err: Error) => output.append(Buffer.from("stdin: " + err.message + "\n")));
            child.stdin.end(options.input);
        }

        child.on("error", (err: Error) => {
            output.append(Buffer.from(err.message));
            finish(reason ? exitCodeFor(reason) : SPAWN_FAILURE_CODE);
        });

        child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
            if (reason) {
                finish(exitCodeFor(reason));
            } else if (code !== null) {
                finish(code);
            } else if (signal) {
                finish(128 + (os.constants.signals[signal] || 0));
            } else {
                finish(1);
            }
        });

        if (options.timeoutMs > 0) {
            timeoutTimer = setTimeout(() => terminate("timeout"), options.timeoutMs);
        }

        if (options.token) {
            unregisterCancel = options.token.onCancellationRequested(() => terminate("cancel"));
        }
    }
}

function exitCodeFor(reason: "timeout" | "cancel"): number {
    return reason === "timeout" ? TIMEOUT_CODE : CANCELLED_CODE;
}

/**
 * Signals the whole process group, which outlives its leader when the command left something running in the
 * background. Falls back to the process alone.
 */
function killProcess(child: ChildProcess, signal: NodeJS.Signals): void {
    if (child.pid !== undefined && process.platform !== "win32" && killGroup(child.pid, signal)) {
        return;
    }

    if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
    }
}

function killGroup(pid: number, signal: NodeJS.Signals): boolean {
    try {
        process.kill(-pid, signal);
        return true;
    } catch (e) {
        // the group is gone or was never created
        return false;
    }
}

/**
 * Keeps the last `limit` bytes written to it.
 */
export class OutputBuffer {
    private chunks: Buffer[] = [];
    private length: number = 0;
    private dropped: number = 0;

    constructor(private readonly limit: number) {
    }

    append(chunk: Buffer): void {
        this.chunks.push(chunk);
        this.length += chunk.length;

        if (this.length > this.limit * 2) {
            this.compact();
        }
    }

    toString(): string {
        this.compact();
        const text: string = Buffer.concat(this.chunks).toString("utf8");
        return this.dropped > 0 ? `[${this.dropped} bytes of earlier output omitted]\n` + text : text;
    }

    private compact(): void {
        if (this.length <= this.limit) {
            return;
        }

        const all: Buffer = Buffer.concat(this.chunks);
        let start: number = all.length - this.limit;

        // never start in the middle of a UTF-8 sequence
        while (start < all.length && (all[start] & 0xC0) === 0x80) {
            start++;
        }

        this.dropped += start;
        this.chunks = [all.subarray(start)];
        this.length = all.length - start;
    }
}
