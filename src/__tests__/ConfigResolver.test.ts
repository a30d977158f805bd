import {getAllConfigVarDependencies, resolveConfigVars} from "../internal/ConfigResolver";
import {SimpleStore} from "../internal/SimpleStore";
import {ConfigError} from "../public/errors/ConfigError";

const SECTIONS: string[] = ["name", "env", "runner", "jobs"];

function resolve(store: SimpleStore): Promise<void> {
    return new Promise((resolvePromise: () => void, reject: (err: Error) => void) => {
        resolveConfigVars(store, SECTIONS, (err?: Error | null) => {
            if (err) {
                reject(err);
            } else {
                resolvePromise();
            }
        });
    });
}

function storeOf(values: {[key: string]: unknown}): SimpleStore {
    const store: SimpleStore = new SimpleStore("test");
    Object.keys(values).forEach((key: string) => store.set(key, values[key]));
    return store;
}

describe("getAllConfigVarDependencies", () => {
    it("lists references in order", () => {
        expect(getAllConfigVarDependencies("${a:b}/x/${c}")).toEqual(["a:b", "c"]);
    });

    it("finds nothing in plain text", () => {
        expect(getAllConfigVarDependencies("plain $ text {}")).toEqual([]);
        expect(getAllConfigVarDependencies("")).toEqual([]);
    });
});

describe("resolveConfigVars", () => {
    it("replaces references inside strings", async () => {
        const store: SimpleStore = storeOf({
            name: "CI",
            runner: {"out-dir": ".jobline"},
            env: {LOG: "${runner:out-dir}/${name}.log"}
        });

        await resolve(store);

        expect(store.get("env:LOG")).toBe(".jobline/CI.log");
    });

    it("resolves references to list items and chains of references", async () => {
        const store: SimpleStore = storeOf({
            name: "${jobs:Build:steps:0:name}",
            jobs: {Build: {steps: [{name: "Compile ${env:TARGET}"}]}},
            env: {TARGET: "release"}
        });

        await resolve(store);

        expect(store.get("name")).toBe("Compile release");
        expect(store.get("jobs:Build:steps:0:name")).toBe("Compile release");
    });

    it("replaces a lone reference with a non-string value", async () => {
        const store: SimpleStore = storeOf({
            runner: {"max-parallel": 2, "step-timeout": "${runner:max-parallel}"}
        });

        await resolve(store);

        expect(store.get("runner:step-timeout")).toBe(2);
    });

    it("leaves references outside the sections alone", async () => {
        const store: SimpleStore = storeOf({
            jobs: {Build: {steps: [{name: "Home", run: "echo ${HOME}"}]}}
        });

        await resolve(store);

        expect(store.get("jobs:Build:steps:0:run")).toBe("echo ${HOME}");
    });

    it("rejects missing variables", async () => {
        const store: SimpleStore = storeOf({name: "${env:MISSING}"});

        await expect(resolve(store)).rejects.toThrow(ConfigError);
    });

    it("rejects circular references", async () => {
        const store: SimpleStore = storeOf({env: {A: "${env:B}", B: "${env:A}"}});

        await expect(resolve(store)).rejects.toThrow(/Circular dependency/);
    });

    it("rejects objects embedded in text", async () => {
        const store: SimpleStore = storeOf({name: "runner is ${runner}", runner: {"max-parallel": 1}});

        await expect(resolve(store)).rejects.toThrow(/cannot be embedded in text/);
    });
});

describe("SimpleStore", () => {
    it("keeps separate stores apart", () => {
        const first: SimpleStore = new SimpleStore("same");
        const second: SimpleStore = new SimpleStore("same");

        first.set("name", "first");

        expect(first.get("name")).toBe("first");
        expect(second.exists("name")).toBe(false);
    });

    it("returns single values as arrays", () => {
        const store: SimpleStore = storeOf({plugins: "one", list: ["a", "b"]});

        expect(store.getAsArray("plugins")).toEqual(["one"]);
        expect(store.getAsArray("list")).toEqual(["a", "b"]);
        expect(store.getAsArray("missing")).toEqual([]);
    });

    it("shares the provider with child stores", () => {
        const store: SimpleStore = new SimpleStore("root");
        store.child("runner").set("max-parallel", 3);

        expect(store.get("runner:max-parallel")).toBe(3);
        expect(store.asObject()).toEqual({runner: {"max-parallel": 3}});
    });
});
