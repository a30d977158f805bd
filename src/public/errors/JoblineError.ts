/**
 * Base class of the errors jobline raises on purpose. The code tells callers (and the command line) what kind of
 * failure occurred without instanceof checks.
 */
export class JoblineError extends Error {
    readonly code: string;

    constructor(code: string, message: string) {
        super(message);
        this.code = code;
        this.name = new.target.name;
    }
}
