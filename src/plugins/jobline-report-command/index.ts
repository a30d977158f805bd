import {IPluginIndex} from "../../public/plugins/IPluginIndex";
import {IPluginRegistry} from "../../public/plugins/PluginType";
import {commandReport} from "./CommandReportSink";

const fn: IPluginIndex = (registry: IPluginRegistry): void => {
    registry.report["command"] = commandReport;
};

export default fn;
