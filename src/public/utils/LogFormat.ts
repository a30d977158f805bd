import _ = require("lodash");
import winston = require("winston");
import {ICommonLogOptions} from "../options/logging/ICommonLogOptions";
import {ELogOutputFormat} from "../options/logging/ELogOutputFormat";

const defaultLabel: winston.Logform.FormatWrap = winston.format(
    (info: winston.Logform.TransformableInfo, opts?: unknown) => {
        const label: unknown = _.get(opts, "label");
        if (!info.label && _.isString(label)) {
            info.label = label;
        }
        return info;
    });

/**
 * Builds the winston format of a transport. Lines carry the `label` of the logger that wrote them, or the fallback
 * label when it has none.
 */
export function createLogFormat(options: ICommonLogOptions,
                                colorize: boolean,
                                fallbackLabel: string): winston.Logform.Format {
    const formats: winston.Logform.Format[] = [defaultLabel({label: fallbackLabel})];

    if (options.timestamp) {
        formats.push(winston.format.timestamp());
    }

    if (options.format === ELogOutputFormat.json) {
        formats.push(winston.format.json());
        return winston.format.combine(...formats);
    }

    if (colorize) {
        formats.push(winston.format.colorize());
    }

    formats.push(winston.format.printf((info: winston.Logform.TransformableInfo) => {
        const timestamp: string = info.timestamp ? String(info.timestamp) + " " : "";
        return `${timestamp}[${String(info.label)}] ${info.level}: ${String(info.message)}`;
    }));

    return winston.format.combine(...formats);
}
