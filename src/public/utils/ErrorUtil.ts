import _ = require("lodash");

export class ErrorUtil {
    static customize(e: Error | string | null | undefined, message: string): Error {
        if (!e) {
            return new Error(message);
        } else if (_.isString(e)) {
            return new Error(message + "\n" + e);
        } else {
            e.message = message + "\n" + e.message;
            return e;
        }
    }

    /**
     * Turns anything that was thrown into an Error.
     */
    static toError(thrown: unknown): Error {
        if (thrown instanceof Error) {
            return thrown;
        } else if (_.isString(thrown)) {
            return new Error(thrown);
        } else {
            return new Error("Unknown error: " + String(thrown));
        }
    }

    /**
     * Stringifies an object including Errors and Maps (which cannot be stringified with JSON.stringify).
     */
    static stringify(obj: unknown): string {
        return JSON.stringify(ErrorUtil.recursivePropertyFinder(obj), null, "\t");
    }

    private static recursivePropertyFinder(obj: unknown): unknown {
        if (obj instanceof Map) {
            const retVal: _.Dictionary<unknown> = {};
            obj.forEach((value: unknown, key: unknown) => {
                retVal[String(key)] = ErrorUtil.recursivePropertyFinder(value);
            });
            return retVal;
        } else if (_.isArray(obj)) {
            return _.map(obj, (item: unknown) => ErrorUtil.recursivePropertyFinder(item));
        } else if (obj instanceof Error) {
            const retVal: _.Dictionary<unknown> = {name: obj.name, message: obj.message};
            _.forEach(Object.getOwnPropertyNames(obj), (key: string) => {
                retVal[key] = ErrorUtil.recursivePropertyFinder(Reflect.get(obj, key));
            });
            return retVal;
        } else if (_.isObject(obj) && _.isPlainObject(obj)) {
            const retVal: _.Dictionary<unknown> = {};
            _.forEach(Object.entries(obj), ([key, value]: [string, unknown]) => {
                retVal[key] = ErrorUtil.recursivePropertyFinder(value);
            });
            return retVal;
        } else {
            return obj;
        }
    }
}
