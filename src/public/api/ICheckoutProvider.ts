import async = require("async");

/**
 * Makes the source of the given ref available locally. Fails with a CheckoutError.
 */
export interface ICheckoutProvider {
    readonly name: string;

    checkout(ref: string, callback: async.AsyncResultCallback<string, Error>): void;
}
