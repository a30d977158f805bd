import async = require("async");
import fs = require("fs");
import {z} from "zod";
import {ICheckoutProvider} from "../../public/api/ICheckoutProvider";
import {IPluginParams} from "../../public/options/IPluginParams";
import {CheckoutError} from "../../public/errors/CheckoutError";
import {ErrorUtil} from "../../public/utils/ErrorUtil";
import {OptionsUtil} from "../../public/utils/OptionsUtil";
import {PathUtils} from "../../public/utils/PathUtils";

export const localCheckoutOptionsSchema = z.object({
    /**
     * The directory that holds the source, relative to the working directory.
     *
     * Default: the working directory
     */
    path: z.string().min(1).default(".")
}).strict();

/**
 * Uses a directory that already holds the source. The ref is not looked at.
 */
export class LocalCheckout implements ICheckoutProvider {
    readonly name: string = "local";

    constructor(readonly directory: string) {
    }

    checkout(ref: string, callback: async.AsyncResultCallback<string, Error>): void {
        fs.stat(this.directory, (err: NodeJS.ErrnoException | null, stats: fs.Stats) => {
            if (err) {
                callback(new CheckoutError(`The source directory ${this.directory} cannot be read: ${err.message}`));
            } else if (!stats.isDirectory()) {
                callback(new CheckoutError(`The source path ${this.directory} is not a directory.`));
            } else {
                callback(null, this.directory);
            }
        });
    }
}

export function localCheckout(params: IPluginParams, result: async.AsyncResultCallback<ICheckoutProvider, Error>): void {
    try {
        const options: z.infer<typeof localCheckoutOptionsSchema> =
            OptionsUtil.parse(localCheckoutOptionsSchema, params.options, "the local checkout");
        result(null, new LocalCheckout(PathUtils.getAsAbsolutePath(options.path, params.workingDir)));
    } catch (e) {
        result(ErrorUtil.toError(e));
    }
}
