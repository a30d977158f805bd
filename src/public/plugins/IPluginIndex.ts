import {IPluginRegistry} from "./PluginType";

/**
 * The default export of a plugin module. Adds the module's plugins to the registry.
 */
export type IPluginIndex = (registry: IPluginRegistry) => void;
