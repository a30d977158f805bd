import {JoblineError} from "./JoblineError";

/**
 * A job's environment could not be prepared. Fails that job only.
 */
export class ProvisionError extends JoblineError {
    static readonly CODE: string = "E_PROVISION";

    constructor(message: string) {
        super(ProvisionError.CODE, message);
    }
}
