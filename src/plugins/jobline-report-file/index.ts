import {IPluginIndex} from "../../public/plugins/IPluginIndex";
import {IPluginRegistry} from "../../public/plugins/PluginType";
import {fileReport} from "./FileReportSink";

const fn: IPluginIndex = (registry: IPluginRegistry): void => {
    registry.report["file"] = fileReport;
};

export default fn;
