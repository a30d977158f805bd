import {JoblineError} from "./JoblineError";

/**
 * The source could not be checked out. Aborts the pipeline before scheduling.
 */
export class CheckoutError extends JoblineError {
    static readonly CODE: string = "E_CHECKOUT";

    constructor(message: string) {
        super(CheckoutError.CODE, message);
    }
}
