import {IPluginIndex} from "../../public/plugins/IPluginIndex";
import {IPluginRegistry} from "../../public/plugins/PluginType";
import {fileLogger} from "./FileLogger";

const fn: IPluginIndex = (registry: IPluginRegistry): void => {
    registry.log["files"] = fileLogger;
};

export default fn;
