import async = require("async");
import fs = require("fs");
import mkdirp = require("mkdirp");
import path = require("path");
import {z} from "zod";
import {IReportSink} from "../../public/api/IReportSink";
import {IPluginParams} from "../../public/options/IPluginParams";
import {ErrorUtil} from "../../public/utils/ErrorUtil";
import {OptionsUtil} from "../../public/utils/OptionsUtil";
import {PathUtils} from "../../public/utils/PathUtils";

export const fileReportOptionsSchema = z.object({
    /**
     * Relative to the working directory.
     *
     * Default: ${runner:out-dir}/<run id>/report.txt
     */
    path: z.string().min(1).optional()
}).strict();

/**
 * Writes the report to a file, replacing what was there.
 */
export class FileReportSink implements IReportSink {
    readonly name: string = "file";

    constructor(readonly filePath: string) {
    }

    upload(report: string, callback: async.AsyncResultCallback<boolean, Error>): void {
        mkdirp(path.dirname(this.filePath)).then(
            () => {
                fs.writeFile(this.filePath, report, "utf8", (err: NodeJS.ErrnoException | null) => {
                    if (err) {
                        callback(ErrorUtil.customize(err, "Could not write the report to " + this.filePath));
                    } else {
                        callback(null, true);
                    }
                });
            },
            (err: Error) => callback(ErrorUtil.customize(err, "Could not create the directory of " + this.filePath)));
    }
}

export function fileReport(params: IPluginParams, result: async.AsyncResultCallback<IReportSink, Error>): void {
    try {
        const options: z.infer<typeof fileReportOptionsSchema> =
            OptionsUtil.parse(fileReportOptionsSchema, params.options, "the file report");
        result(null, new FileReportSink(options.path
            ? PathUtils.getAsAbsolutePath(options.path, params.workingDir)
            : path.resolve(params.outDir, params.runId, "report.txt")));
    } catch (e) {
        result(ErrorUtil.toError(e));
    }
}
