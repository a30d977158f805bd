import async = require("async");
import {IPluginParams} from "../options/IPluginParams";
import {IReportSink} from "../api/IReportSink";

/**
 * Creates the report sink described by the plugin's options.
 */
export type IReportPlugin = (params: IPluginParams, result: async.AsyncResultCallback<IReportSink, Error>) => void;
