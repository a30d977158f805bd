import async = require("async");

/**
 * Receives the rendered report. The callback's result tells whether the upload was accepted.
 */
export interface IReportSink {
    readonly name: string;

    upload(report: string, callback: async.AsyncResultCallback<boolean, Error>): void;
}
