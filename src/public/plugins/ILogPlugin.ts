import async = require("async");
import TransportStream = require("winston-transport");
import {ILogPluginParams} from "../options/logging/ILogPluginParams";

/**
 * Creates the winston transports described by the plugin's options.
 */
export type ILogPlugin = (params: ILogPluginParams,
                          result: async.AsyncResultCallback<Array<TransportStream>, Error>) => void;
