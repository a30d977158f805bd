import fs = require("fs");
import os = require("os");
import path = require("path");
import {currentProcessVariables, IScratchEnvironmentOptions, ScratchEnvironmentFactory} from "../internal/Environment";
import {StepRunner} from "../internal/StepRunner";
import {IEnvironment} from "../public/api/IEnvironment";
import {IJobDefinition} from "../public/api/IJob";
import {ProvisionError} from "../public/errors/ProvisionError";
import {jobOf, nodeStep, TestLogger} from "./helpers";

describe("ScratchEnvironmentFactory", () => {
    let workingDir: string;
    let outDir: string;

    beforeEach(() => {
        workingDir = fs.mkdtempSync(path.join(os.tmpdir(), "jobline-env-"));
        outDir = path.join(workingDir, ".jobline");
    });

    afterEach(() => {
        fs.rmSync(workingDir, {recursive: true, force: true});
    });

    function factoryWith(overrides: Partial<IScratchEnvironmentOptions> = {}): ScratchEnvironmentFactory {
        return new ScratchEnvironmentFactory({
            runId: "run-1",
            workingDir: workingDir,
            outDir: outDir,
            baseVariables: {...currentProcessVariables(), A: "base", C: "base"},
            toolchains: {
                nightly: {name: "nightly", env: {A: "toolchain", B: "toolchain"}},
                broken: {name: "broken", env: {}, check: "echo not installed; exit 3"}
            },
            keepEnvironments: false,
            stepRunner: new StepRunner(),
            logger: new TestLogger(),
            ...overrides
        });
    }

    function acquire(factory: ScratchEnvironmentFactory, job: IJobDefinition): Promise<IEnvironment> {
        return new Promise((resolve: (env: IEnvironment) => void, reject: (err: Error) => void) => {
            factory.acquire(job, (err?: Error | null, env?: IEnvironment) => {
                if (err || !env) {
                    reject(err || new Error("no environment"));
                } else {
                    resolve(env);
                }
            });
        });
    }

    function release(env: IEnvironment): Promise<void> {
        return new Promise((resolve: () => void, reject: (err: Error) => void) => {
            env.release((err?: Error | null) => err ? reject(err) : resolve());
        });
    }

    it("creates a scratch directory per environment and removes it on release", async () => {
        const factory: ScratchEnvironmentFactory = factoryWith();
        const first: IEnvironment = await acquire(factory, jobOf("Build", [nodeStep("s", "")]));
        const second: IEnvironment = await acquire(factory, jobOf("Build", [nodeStep("s", "")]));

        expect(first.id).toMatch(/^build-[0-9a-f]{8}$/);
        expect(first.id).not.toBe(second.id);
        expect(first.workingDir).toBe(workingDir);
        expect(first.scratchDir).toBe(path.resolve(outDir, "run-1", first.id));
        expect(fs.existsSync(first.scratchDir)).toBe(true);

        await release(first);

        expect(fs.existsSync(first.scratchDir)).toBe(false);
        expect(fs.existsSync(second.scratchDir)).toBe(true);
        await release(second);
    });

    it("refuses a second release", async () => {
        const env: IEnvironment = await acquire(factoryWith(), jobOf("Build", [nodeStep("s", "")]));
        await release(env);

        await expect(release(env)).rejects.toThrow(`The environment ${env.id} was already released.`);
    });

    it("keeps the scratch directory when asked to", async () => {
        const env: IEnvironment = await acquire(factoryWith({keepEnvironments: true}), jobOf("Build", [nodeStep("s", "")]));
        await release(env);

        expect(fs.existsSync(env.scratchDir)).toBe(true);
    });

    it("layers the variables of the toolchain, the dotenv files and the job", async () => {
        fs.writeFileSync(path.join(workingDir, "build.env"), "B=file\nD=file\n");
        const job: IJobDefinition = {
            name: "Build",
            toolchain: "nightly",
            env: {D: "job"},
            envVarFiles: {dotenv: ["build.env"]},
            steps: [nodeStep("s", "")]
        };

        const env: IEnvironment = await acquire(factoryWith(), job);

        expect(env.variables["A"]).toBe("toolchain");
        expect(env.variables["B"]).toBe("file");
        expect(env.variables["C"]).toBe("base");
        expect(env.variables["D"]).toBe("job");
        expect(env.variables["JOBLINE"]).toBe("true");
        expect(env.variables["JOBLINE_RUN_ID"]).toBe("run-1");
        expect(env.variables["JOBLINE_JOB"]).toBe("Build");
        expect(env.variables["JOBLINE_ENVIRONMENT_ID"]).toBe(env.id);
        expect(env.variables["JOBLINE_SCRATCH_DIR"]).toBe(env.scratchDir);
        expect(env.variables["JOBLINE_TOOLCHAIN"]).toBe("nightly");
        await release(env);
    });

    it("fails with a ProvisionError when the toolchain check fails", async () => {
        const job: IJobDefinition = {...jobOf("Coverage", [nodeStep("s", "")]), toolchain: "broken"};

        const error: unknown = await acquire(factoryWith(), job).then(() => undefined, (err: Error) => err);

        expect(error).toBeInstanceOf(ProvisionError);
        expect(error instanceof Error && error.message)
            .toBe("The check \"echo not installed; exit 3\" of toolchain broken failed: exit code 3\nnot installed\n");
        expect(fs.readdirSync(path.join(outDir, "run-1"))).toEqual([]);
    });

    it("fails with a ProvisionError for an unknown toolchain", async () => {
        const job: IJobDefinition = {...jobOf("Build", [nodeStep("s", "")]), toolchain: "stable"};

        await expect(acquire(factoryWith(), job)).rejects.toThrow(ProvisionError);
    });

    it("fails with a ProvisionError for a missing dotenv file", async () => {
        const job: IJobDefinition = {...jobOf("Build", [nodeStep("s", "")]), envVarFiles: {dotenv: ["missing.env"]}};

        await expect(acquire(factoryWith(), job)).rejects.toThrow(ProvisionError);
    });
});
