import async = require("async");
import {IPluginParams} from "../options/IPluginParams";
import {ICheckoutProvider} from "../api/ICheckoutProvider";

/**
 * Creates the checkout provider described by the plugin's options.
 */
export type ICheckoutPlugin = (params: IPluginParams, result: async.AsyncResultCallback<ICheckoutProvider, Error>) => void;
