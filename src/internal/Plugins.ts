import {IPluginRegistry} from "../public/plugins/PluginType";

/**
 * Separated from PluginManager to avoid circular dependencies for the plugins that ship with jobline.
 */
// tslint:disable-next-line
export const Plugins: IPluginRegistry = {
    log: {},
    report: {},
    checkout: {}
};
