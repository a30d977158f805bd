import _ = require("lodash");
import async = require("async");
import path = require("path");
import winston = require("winston");
import TransportStream = require("winston-transport");
import {ILogPluginParams} from "../../public/options/logging/ILogPluginParams";
import {PathUtils} from "../../public/utils/PathUtils";
import {ErrorUtil} from "../../public/utils/ErrorUtil";
import {OptionsUtil} from "../../public/utils/OptionsUtil";
import {createLogFormat} from "../../public/utils/LogFormat";
import {fileLogOptionsSchema, IFileLogOptions} from "./IFileLogOptions";

export const DEFAULT_LOG_FILE: string = "jobline.log";

export function fileLogger(
    params: ILogPluginParams, result: async.AsyncResultCallback<Array<TransportStream>, Error>): void {

    let files: Array<IFileLogOptions>;
    try {
        files = OptionsUtil.parseList(fileLogOptionsSchema, params.options, "the file log");
    } catch (e) {
        result(ErrorUtil.toError(e));
        return;
    }

    const defaultFilePath: string = path.resolve(params.outDir, DEFAULT_LOG_FILE);

    result(null, _.map(files, (opt: IFileLogOptions) =>
        new winston.transports.File({
            filename: opt.path ? PathUtils.getAsAbsolutePath(opt.path, params.workingDir) : defaultFilePath,
            level: opt.level,
            maxsize: opt.maxsize,
            maxFiles: opt.maxFiles,
            zippedArchive: opt.zippedArchive,
            format: createLogFormat(opt, false, params.label)
        }))
    );
}
