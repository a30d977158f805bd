import async = require("async");
import fs = require("fs");
import os = require("os");
import path = require("path");
import {PluginManager} from "../internal/PluginManager";
import {Plugins} from "../internal/Plugins";
import {ICheckoutProvider} from "../public/api/ICheckoutProvider";
import {IReportSink} from "../public/api/IReportSink";
import {IPluginParams} from "../public/options/IPluginParams";
import {CheckoutError} from "../public/errors/CheckoutError";
import {ConfigError} from "../public/errors/ConfigError";
import {TestLogger} from "./helpers";

type IFactory<T> = (params: IPluginParams, result: async.AsyncResultCallback<T, Error>) => void;

function create<T>(factory: IFactory<T> | undefined, params: IPluginParams): Promise<T> {
    return new Promise((resolve: (instance: T) => void, reject: (err: Error) => void) => {
        if (!factory) {
            reject(new Error("plugin not registered"));
            return;
        }
        factory(params, (err?: Error | null, instance?: T) => {
            if (err || instance === undefined) {
                reject(err || new Error("no instance"));
            } else {
                resolve(instance);
            }
        });
    });
}

function checkout(provider: ICheckoutProvider, ref: string): Promise<string> {
    return new Promise((resolve: (dir: string) => void, reject: (err: Error) => void) => {
        provider.checkout(ref, (err?: Error | null, dir?: string) => err || !dir ? reject(err || new Error()) : resolve(dir));
    });
}

function upload(sink: IReportSink, report: string): Promise<boolean> {
    return new Promise((resolve: (ok: boolean) => void, reject: (err: Error) => void) => {
        sink.upload(report, (err?: Error | null, ok?: boolean) => err ? reject(err) : resolve(ok === true));
    });
}

describe("built-in plugins", () => {
    let workingDir: string;

    beforeAll(() => {
        PluginManager.initDefault();
    });

    beforeEach(() => {
        workingDir = fs.mkdtempSync(path.join(os.tmpdir(), "jobline-plugins-"));
    });

    afterEach(() => {
        fs.rmSync(workingDir, {recursive: true, force: true});
    });

    function params(options: unknown): IPluginParams {
        return {
            options: options,
            workingDir: workingDir,
            outDir: path.join(workingDir, ".jobline"),
            runId: "run-1",
            logger: new TestLogger()
        };
    }

    it("registers every built-in plugin by name", () => {
        expect(Object.keys(Plugins.log).sort()).toEqual(["console", "files"]);
        expect(Object.keys(Plugins.checkout).sort()).toEqual(["git", "local"]);
        expect(Object.keys(Plugins.report).sort()).toEqual(["command", "file"]);
    });

    describe("local checkout", () => {
        it("returns an existing directory", async () => {
            fs.mkdirSync(path.join(workingDir, "src"));
            const provider: ICheckoutProvider = await create(Plugins.checkout["local"], params({path: "src"}));

            expect(await checkout(provider, "develop")).toBe(path.join(workingDir, "src"));
        });

        it("defaults to the working directory", async () => {
            const provider: ICheckoutProvider = await create(Plugins.checkout["local"], params(undefined));

            expect(await checkout(provider, "develop")).toBe(workingDir);
        });

        it("fails with a CheckoutError for a missing directory", async () => {
            const provider: ICheckoutProvider = await create(Plugins.checkout["local"], params({path: "missing"}));

            await expect(checkout(provider, "develop")).rejects.toThrow(CheckoutError);
        });

        it("rejects unknown options", async () => {
            await expect(create(Plugins.checkout["local"], params({dir: "src"}))).rejects.toThrow(ConfigError);
        });
    });

    describe("git checkout", () => {
        it("needs a url", async () => {
            await expect(create(Plugins.checkout["git"], params({}))).rejects.toThrow(ConfigError);
        });

        it("fails with a CheckoutError when the clone fails", async () => {
            const provider: ICheckoutProvider = await create(Plugins.checkout["git"], params({
                url: path.join(workingDir, "no-such-repo"),
                path: "clone"
            }));

            await expect(checkout(provider, "develop")).rejects.toThrow(CheckoutError);
        });
    });

    describe("file report", () => {
        it("writes the report", async () => {
            const sink: IReportSink = await create(Plugins.report["file"], params({path: "out/report.txt"}));

            expect(await upload(sink, "the report\n")).toBe(true);
            expect(fs.readFileSync(path.join(workingDir, "out", "report.txt"), "utf8")).toBe("the report\n");
        });

        it("writes to the run directory by default", async () => {
            const sink: IReportSink = await create(Plugins.report["file"], params(null));

            await upload(sink, "report");

            expect(fs.readFileSync(path.join(workingDir, ".jobline", "run-1", "report.txt"), "utf8")).toBe("report");
        });
    });

    describe("command report", () => {
        it("pipes the report into the command", async () => {
            const sink: IReportSink = await create(Plugins.report["command"], params({run: "cat > received.txt"}));

            expect(await upload(sink, "the report\n")).toBe(true);
            expect(fs.readFileSync(path.join(workingDir, "received.txt"), "utf8")).toBe("the report\n");
        });

        it("reports a failed upload when the command fails", async () => {
            const sink: IReportSink = await create(Plugins.report["command"], params({run: "cat > /dev/null; exit 1"}));

            expect(await upload(sink, "the report\n")).toBe(false);
        });

        it("needs a command", async () => {
            await expect(create(Plugins.report["command"], params({}))).rejects.toThrow(ConfigError);
        });
    });
});

describe("PluginManager.requirePlugins", () => {
    it("fails with a ConfigError for a module that cannot be found", (done: jest.DoneCallback) => {
        PluginManager.requirePlugins(["jobline-plugin-that-does-not-exist"], (err?: Error | null) => {
            expect(err).toBeInstanceOf(ConfigError);
            done();
        });
    });

    it("skips modules that are already loaded", (done: jest.DoneCallback) => {
        PluginManager.initDefault();
        PluginManager.requirePlugins(["jobline-log-console"], (err?: Error | null) => {
            expect(err).toBeFalsy();
            done();
        });
    });
});
