import _ = require("lodash");
import {ILogPlugin} from "./ILogPlugin";
import {IReportPlugin} from "./IReportPlugin";
import {ICheckoutPlugin} from "./ICheckoutPlugin";

export type PluginType = ILogPlugin | IReportPlugin | ICheckoutPlugin;

/**
 * All known plugins, by kind and then by the name used in the pipeline document.
 */
export interface IPluginRegistry {
    log: _.Dictionary<ILogPlugin>;
    report: _.Dictionary<IReportPlugin>;
    checkout: _.Dictionary<ICheckoutPlugin>;
}
