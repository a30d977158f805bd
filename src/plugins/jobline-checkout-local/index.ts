import {IPluginIndex} from "../../public/plugins/IPluginIndex";
import {IPluginRegistry} from "../../public/plugins/PluginType";
import {localCheckout} from "./LocalCheckout";

const fn: IPluginIndex = (registry: IPluginRegistry): void => {
    registry.checkout["local"] = localCheckout;
};

export default fn;
