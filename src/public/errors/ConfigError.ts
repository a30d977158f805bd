import {JoblineError} from "./JoblineError";

/**
 * The pipeline document is malformed. Always raised before any job runs.
 */
export class ConfigError extends JoblineError {
    static readonly CODE: string = "E_CONFIG";

    constructor(message: string) {
        super(ConfigError.CODE, message);
    }
}
