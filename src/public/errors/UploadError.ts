import {JoblineError} from "./JoblineError";

/**
 * The report sink rejected the report or failed to take it.
 */
export class UploadError extends JoblineError {
    static readonly CODE: string = "E_UPLOAD";

    constructor(message: string) {
        super(UploadError.CODE, message);
    }
}
