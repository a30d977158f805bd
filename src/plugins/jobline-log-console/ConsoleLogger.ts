import _ = require("lodash");
import async = require("async");
import winston = require("winston");
import TransportStream = require("winston-transport");
import {ILogPluginParams} from "../../public/options/logging/ILogPluginParams";
import {ErrorUtil} from "../../public/utils/ErrorUtil";
import {OptionsUtil} from "../../public/utils/OptionsUtil";
import {createLogFormat} from "../../public/utils/LogFormat";
import {consoleLogOptionsSchema, IConsoleLogOptions} from "./IConsoleLogOptions";

export function consoleLogger(
    params: ILogPluginParams, result: async.AsyncResultCallback<Array<TransportStream>, Error>): void {

    let items: Array<IConsoleLogOptions>;
    try {
        items = OptionsUtil.parseList(consoleLogOptionsSchema, params.options, "the console log");
    } catch (e) {
        result(ErrorUtil.toError(e));
        return;
    }

    result(null, _.map(items, (opt: IConsoleLogOptions) =>
        new winston.transports.Console({
            level: opt.level,
            silent: opt.silent,
            // everything goes to stderr so that stdout only carries the report
            stderrLevels: _.keys(winston.config.npm.levels),
            format: createLogFormat(opt, opt.colorize, params.label)
        }))
    );
}
