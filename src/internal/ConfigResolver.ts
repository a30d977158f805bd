import _ = require("lodash");
import async = require("async");
import {SimpleStore} from "./SimpleStore";
import {ConfigError} from "../public/errors/ConfigError";
import {ErrorUtil} from "../public/utils/ErrorUtil";

/**
 * Replaces `${section:key}` references inside the string values of the given sections with the referenced values.
 *
 * Paths are separated by colons; list items are addressed by their index, e.g. `${jobs:Build:steps:0:name}`.
 *
 * Only references whose first segment is one of the sections are resolved; others, such as `${HOME}` in a shell
 * script, are left as they are.
 *
 * A string that is nothing but a reference to a non-string value (a number, list or object) becomes that value.
 * References to missing values and circular references are ConfigErrors.
 */
export function resolveConfigVars(store: SimpleStore, sections: string[], callback: async.ErrorCallback<Error>): void {

    function setValue(path: string, value: unknown): void {
        if (_.isNil(value)) {
            throw new ConfigError(`A variable in path ${path} cannot be resolved`);
        }

        store.set(path, value);
    }

    function evalValue(path: string, value: unknown, memoize: _.Dictionary<boolean>): unknown {
        const newCurrentlyBeingResolved: _.Dictionary<boolean> = _.clone(memoize);

        if (newCurrentlyBeingResolved[path]) {
            throw new ConfigError("Circular dependency detected (variable " + path + ").");
        }

        newCurrentlyBeingResolved[path] = true;

        if (_.isString(value)) {
            let strValue: string = value;

            for (const depPath of getAllConfigVarDependencies(value)) {
                if (!_.includes(sections, depPath.split(":")[0])) {
                    // not a config variable, e.g. ${HOME} in a shell script
                    continue;
                }

                const dependencyValue: unknown = evalValue(depPath, store.get(depPath), newCurrentlyBeingResolved);

                if (_.isNil(dependencyValue)) {
                    throw new ConfigError(`The variable \${${depPath}} used in ${path} is not defined`);
                } else if (value === "${" + depPath + "}" && !_.isString(dependencyValue)) {
                    setValue(path, dependencyValue);
                    return dependencyValue;
                } else if (_.isString(dependencyValue) || _.isNumber(dependencyValue) || _.isBoolean(dependencyValue)) {
                    strValue = strValue.split("${" + depPath + "}").join(String(dependencyValue));
                } else {
                    throw new ConfigError(
                        `The variable \${${depPath}} used in ${path} is not a string and cannot be embedded in text`);
                }
            }

            if (strValue !== value) {
                setValue(path, strValue);
            }
            return strValue;
        } else {
            resolve(path, newCurrentlyBeingResolved);
            return store.get(path);
        }
    }

    function resolve(path: string, memoize: _.Dictionary<boolean>): void {
        const val: unknown = store.get(path);
        if (_.isArray(val)) {
            _.forEach(val, (arrayValue: unknown, index: number) => {
                evalValue(path + ":" + index, arrayValue, memoize);
            });
        } else if (_.isPlainObject(val) && _.isObject(val)) {
            _.forEach(_.keys(val), (key: string) => {
                resolve(path + ":" + key, memoize);
            });
        } else if (_.isString(val)) {
            evalValue(path, val, memoize);
        }
    }

    try {
        _.forEach(sections, (section: string) => resolve(section, {}));
    } catch (e) {
        callback(ErrorUtil.toError(e));
        return;
    }

    callback(null);
}

/**
 * Lists the variable paths referenced as `${path}` in the value, in order of appearance.
 */
export function getAllConfigVarDependencies(value: string): string[] {
    if (!value) {
        return [];
    }

    const vars: string[] = [];
    let current: number = 0;
    let lastIndex: number = 0;

    for (let i: number = 0; i < value.length; i++) {
        switch (current) {
            case 1:
                if (value.charAt(i) === "}") {
                    vars.push(value.substring(lastIndex, i));
                    current = 0;
                }
                break;
            default:
                if (value.charAt(i) === "$" && (i + 1) < value.length &&
                    value.charAt(i + 1) === "{") {
                    lastIndex = i + 2;
                    current = 1;
                }
        }
    }

    return vars;
}
