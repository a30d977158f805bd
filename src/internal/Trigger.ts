import _ = require("lodash");
import {IEvent} from "../public/api/IEvent";
import {ITriggerRule} from "../public/api/ITriggerRule";
import {ConfigError} from "../public/errors/ConfigError";

const REGEXP_SPECIAL_CHARACTERS: string = "\\^$.|+()[]{}*?/";

const compiledPatterns: Map<string, RegExp> = new Map();

/**
 * Compiles a branch pattern into an anchored, case-sensitive regular expression.
 *
 * Syntax:
 *  - `*` matches any run of characters except `/`
 *  - `**` matches any run of characters including `/`
 *  - `?` matches one character except `/`
 *  - `[abc]`, `[a-z]` match one character of the class, `[!abc]` or `[^abc]` one character outside of it
 *  - `\` makes the next character literal
 *
 * Anything else matches itself, so a plain branch name is an exact match.
 */
export function compileBranchPattern(pattern: string): RegExp {
    const cached: RegExp | undefined = compiledPatterns.get(pattern);
    if (cached) {
        return cached;
    }

    if (!pattern) {
        throw new ConfigError("A branch pattern cannot be empty.");
    }

    let source: string = "";
    let i: number = 0;

    while (i < pattern.length) {
        const c: string = pattern.charAt(i);

        switch (c) {
            case "*":
                if (pattern.charAt(i + 1) === "*") {
                    source += ".*";
                    i += 2;
                } else {
                    source += "[^/]*";
                    i++;
                }
                break;
            case "?":
                source += "[^/]";
                i++;
                break;
            case "[": {
                const end: number = findClassEnd(pattern, i);
                source += compileClass(pattern, pattern.substring(i + 1, end));
                i = end + 1;
                break;
            }
            case "\\":
                if (i + 1 >= pattern.length) {
                    throw new ConfigError(`The branch pattern "${pattern}" ends with an escape character.`);
                }
                source += escapeCharacter(pattern.charAt(i + 1));
                i += 2;
                break;
            default:
                source += escapeCharacter(c);
                i++;
        }
    }

    let compiled: RegExp;
    try {
        compiled = new RegExp("^" + source + "$");
    } catch (e) {
        throw new ConfigError(`The branch pattern "${pattern}" is malformed.`);
    }

    compiledPatterns.set(pattern, compiled);
    return compiled;
}

/**
 * Checks every pattern of the rules, so that a malformed one is reported before anything runs.
 */
export function validateTriggerRules(rules: ReadonlyArray<ITriggerRule>): void {
    _.forEach(rules, (rule: ITriggerRule) => {
        _.forEach(rule.branches, (branch: string) => {
            compileBranchPattern(branch);
        });
    });
}

/**
 * Decides whether the event runs the pipeline: true as soon as a rule of the event's kind has a branch pattern that
 * matches the event's branch.
 */
export function shouldRun(event: IEvent, rules: ReadonlyArray<ITriggerRule>): boolean {
    for (const rule of rules) {
        if (rule.kind !== event.kind) {
            continue;
        }

        for (const branch of rule.branches) {
            if (compileBranchPattern(branch).test(event.branch)) {
                return true;
            }
        }
    }

    return false;
}

function findClassEnd(pattern: string, start: number): number {
    let i: number = start + 1;

    // a closing bracket right after the (optionally negated) opening bracket is a literal
    if (pattern.charAt(i) === "!" || pattern.charAt(i) === "^") {
        i++;
    }
    if (pattern.charAt(i) === "]") {
        i++;
    }

    while (i < pattern.length) {
        if (pattern.charAt(i) === "\\") {
            i += 2;
        } else if (pattern.charAt(i) === "]") {
            return i;
        } else {
            i++;
        }
    }

    throw new ConfigError(`The branch pattern "${pattern}" has an unterminated character class.`);
}

function compileClass(pattern: string, body: string): string {
    let negated: boolean = false;
    let content: string = body;

    if (content.startsWith("!") || content.startsWith("^")) {
        negated = true;
        content = content.substring(1);
    }

    if (!content) {
        throw new ConfigError(`The branch pattern "${pattern}" has an empty character class.`);
    }

    let source: string = "";
    for (let i: number = 0; i < content.length; i++) {
        const c: string = content.charAt(i);
        if (c === "\\" && i + 1 < content.length) {
            source += "\\" + content.charAt(i + 1);
            i++;
        } else if (c === "-" && i > 0 && i < content.length - 1) {
            if (content.charAt(i - 1) > content.charAt(i + 1)) {
                throw new ConfigError(`The branch pattern "${pattern}" has an out of order range in a character class.`);
            }
            source += "-";
        } else if (c === "\\" || c === "]" || c === "[" || c === "^") {
            source += "\\" + c;
        } else {
            source += c;
        }
    }

    return (negated ? "[^" : "[") + source + "]";
}

function escapeCharacter(c: string): string {
    return REGEXP_SPECIAL_CHARACTERS.indexOf(c) >= 0 ? "\\" + c : c;
}
