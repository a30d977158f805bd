import {IPluginIndex} from "../../public/plugins/IPluginIndex";
import {IPluginRegistry} from "../../public/plugins/PluginType";
import {gitCheckout} from "./GitCheckout";

const fn: IPluginIndex = (registry: IPluginRegistry): void => {
    registry.checkout["git"] = gitCheckout;
};

export default fn;
