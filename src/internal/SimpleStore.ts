import _ = require("lodash");
import nconf = require("nconf");
import {ISimpleStore} from "../public/api/ISimpleStore";

/**
 * Stores values in an nconf provider under a namespace. Every store created without a provider gets its own in-memory
 * provider, so separate runs never see each other's options.
 */
export class SimpleStore implements ISimpleStore {

    namespace: string;

    private provider: nconf.Provider;

    constructor(namespace: string, provider?: nconf.Provider) {
        this.namespace = namespace;
        if (provider) {
            this.provider = provider;
        } else {
            this.provider = new nconf.Provider({});
            this.provider.use("memory");
        }
    }

    /**
     * Creates a store for a nested namespace that shares this store's provider.
     */
    child(namespace: string): SimpleStore {
        return new SimpleStore(this.namespace + ":" + namespace, this.provider);
    }

    exists(key: string): boolean {
        return !_.isNil(this.get(key));
    }

    get(key: string): unknown {
        const value: unknown = this.provider.get(this.namespace + ":" + key);
        return value;
    }

    /**
     * Returns the entire store as an object.
     */
    asObject(): unknown {
        const value: unknown = this.provider.get(this.namespace);
        return value;
    }

    getAsArray(key: string): Array<unknown> {
        const someVal: unknown = this.get(key);
        if (_.isArray(someVal)) {
            return someVal;
        } else if (someVal !== undefined && someVal !== null) {
            return [someVal];
        } else {
            return [];
        }
    }

    set(key: string, value: unknown): void {
        this.provider.set(this.namespace + ":" + key, value);
    }
}
