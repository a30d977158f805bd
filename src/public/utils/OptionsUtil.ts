import _ = require("lodash");
import {z} from "zod";
import {ConfigError} from "../errors/ConfigError";

export class OptionsUtil {

    /**
     * Validates plugin options against the plugin's schema. Throws a ConfigError naming every problem.
     */
    static parse<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
        const parsed: z.SafeParseReturnType<unknown, z.output<S>> = schema.safeParse(_.isNil(value) ? {} : value);
        if (!parsed.success) {
            throw new ConfigError(`The options of ${what} are invalid:\n` + OptionsUtil.formatIssues(parsed.error));
        }
        return parsed.data;
    }

    /**
     * Like parse, but accepts a single options object or a list of them.
     */
    static parseList<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): Array<z.output<S>> {
        const items: unknown[] = _.isArray(value) ? value : [value];
        return _.map(items, (item: unknown) => OptionsUtil.parse(schema, item, what));
    }

    static formatIssues(error: z.ZodError): string {
        return _.map(error.issues, (issue: z.ZodIssue) =>
            (issue.path.length > 0 ? issue.path.join(":") + ": " : "") + issue.message).join("\n");
    }
}
