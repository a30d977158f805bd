import _ = require("lodash");
import {aggregate, applyUploadOutcome, renderReport, skipAll} from "../internal/ResultAggregator";
import {IJobResult} from "../public/api/IJobResult";
import {IAggregatedResult, IPipelineResult} from "../public/api/IPipelineResult";
import {EJobStatus} from "../public/api/EJobStatus";
import {EPipelineStatus} from "../public/api/EPipelineStatus";
import {EReportFormat} from "../public/api/EReportFormat";
import {EEventKind} from "../public/api/EEventKind";
import {jobOf, nodeStep} from "./helpers";

const build: IJobResult = {
    jobName: "Build",
    status: EJobStatus.passed,
    steps: [
        {stepName: "Fetch", exitCode: 0, durationMs: 500, output: ""},
        {stepName: "Build", exitCode: 0, durationMs: 1000, output: "done\n"}
    ],
    durationMs: 1500
};

const test: IJobResult = {
    jobName: "Test",
    status: EJobStatus.failed,
    steps: [
        {stepName: "Fetch", exitCode: 0, durationMs: 500, output: ""},
        {stepName: "Test", exitCode: 101, durationMs: 1500, output: "compiling\nerror: test failed\n"}
    ],
    firstFailureIndex: 1,
    durationMs: 2000
};

const coverage: IJobResult = {
    jobName: "Coverage",
    status: EJobStatus.failed,
    steps: [],
    error: "The toolchain nightly is not installed.",
    durationMs: 10
};

function toPipelineResult(aggregated: IAggregatedResult): IPipelineResult {
    return {
        ...aggregated,
        runId: "run-1",
        pipelineName: "CI",
        event: {kind: EEventKind.push, branch: "develop"},
        triggered: true,
        durationMs: 2500
    };
}

function mapOf(...results: IJobResult[]): Map<string, IJobResult> {
    return new Map(_.map(results, (result: IJobResult): [string, IJobResult] => [result.jobName, result]));
}

describe("aggregate", () => {
    it("passes when no job failed", () => {
        expect(aggregate(mapOf(build)).overallStatus).toBe(EPipelineStatus.passed);
    });

    it("fails when any job failed", () => {
        expect(aggregate(mapOf(build, test)).overallStatus).toBe(EPipelineStatus.failed);
        expect(aggregate(mapOf(coverage)).overallStatus).toBe(EPipelineStatus.failed);
    });

    it("does not fail for skipped jobs", () => {
        const skipped: Map<string, IJobResult> = skipAll([jobOf("A", [nodeStep("s", "")])]);
        expect(aggregate(skipped).overallStatus).toBe(EPipelineStatus.passed);
    });

    it("orders the jobs by declaration", () => {
        const result: IAggregatedResult = aggregate(mapOf(coverage, test, build), ["Build", "Test", "Coverage"]);
        expect(Array.from(result.jobs.keys())).toEqual(["Build", "Test", "Coverage"]);
    });

    it("keeps jobs missing from the order at the end", () => {
        const result: IAggregatedResult = aggregate(mapOf(coverage, test, build), ["Test"]);
        expect(Array.from(result.jobs.keys())).toEqual(["Test", "Coverage", "Build"]);
    });

    it("gives the same verdict when aggregated again", () => {
        const once: IAggregatedResult = aggregate(mapOf(build, test, coverage));
        const twice: IAggregatedResult = aggregate(once.jobs);

        expect(twice.overallStatus).toBe(once.overallStatus);
        expect(Array.from(twice.jobs.entries())).toEqual(Array.from(once.jobs.entries()));
    });
});

describe("skipAll", () => {
    it("marks every job as skipped without steps", () => {
        const skipped: Map<string, IJobResult> = skipAll([jobOf("A", [nodeStep("s", "")]), jobOf("B", [])]);

        expect(Array.from(skipped.values())).toEqual([
            {jobName: "A", status: EJobStatus.skipped, steps: [], durationMs: 0},
            {jobName: "B", status: EJobStatus.skipped, steps: [], durationMs: 0}
        ]);
    });
});

describe("applyUploadOutcome", () => {
    const passed: IPipelineResult = toPipelineResult(aggregate(mapOf(build)));
    const failed: IPipelineResult = toPipelineResult(aggregate(mapOf(test)));

    it("fails a passed pipeline on a failed upload in strict mode", () => {
        const result: IPipelineResult = applyUploadOutcome(passed, {sink: "command", ok: false}, true);

        expect(result.overallStatus).toBe(EPipelineStatus.failed);
        expect(result.upload).toEqual({sink: "command", ok: false});
    });

    it("only records a failed upload when not strict", () => {
        const result: IPipelineResult = applyUploadOutcome(passed, {sink: "command", ok: false}, false);

        expect(result.overallStatus).toBe(EPipelineStatus.passed);
        expect(result.upload).toEqual({sink: "command", ok: false});
    });

    it("never turns a failed pipeline into a passed one", () => {
        expect(applyUploadOutcome(failed, {sink: "file", ok: true}, true).overallStatus)
            .toBe(EPipelineStatus.failed);
    });

    it("leaves the input untouched", () => {
        applyUploadOutcome(passed, {sink: "command", ok: false}, true);

        expect(passed.overallStatus).toBe(EPipelineStatus.passed);
        expect(passed.upload).toBeUndefined();
    });
});

describe("renderReport", () => {
    it("lists every job and the tail of the first failing step", () => {
        const result: IPipelineResult = applyUploadOutcome(
            toPipelineResult(aggregate(mapOf(build, test, coverage))),
            {sink: "command", ok: false, error: "exit code 1"},
            false);

        expect(renderReport(result, EReportFormat.text)).toBe(
            "Pipeline CI (run run-1): FAILED\n" +
            "Event: push to develop\n" +
            "  [PASSED]  Build (2 steps, 1.50s)\n" +
            "  [FAILED]  Test (failed at step 2 \"Test\", exit code 101, 2.00s)\n" +
            "      | compiling\n" +
            "      | error: test failed\n" +
            "  [FAILED]  Coverage (The toolchain nightly is not installed., 0.01s)\n" +
            "Report upload to command: failed (exit code 1)\n");
    });

    it("shows at most the last 20 lines of output", () => {
        const output: string = _.map(_.range(1, 26), (i: number) => "line" + i).join("\n");
        const longFailure: IJobResult = {
            jobName: "Long",
            status: EJobStatus.failed,
            steps: [{stepName: "Run", exitCode: 1, durationMs: 0, output: output}],
            firstFailureIndex: 0,
            durationMs: 0
        };

        const lines: string[] = renderReport(toPipelineResult(aggregate(mapOf(longFailure))), EReportFormat.text)
            .split("\n");

        expect(lines[2]).toBe("  [FAILED]  Long (failed at step 1 \"Run\", exit code 1, 0.00s)");
        expect(lines[3]).toBe("      | line6");
        expect(lines[22]).toBe("      | line25");
        expect(lines.length).toBe(24);
    });

    it("explains why nothing ran when no trigger matched", () => {
        const result: IPipelineResult = {
            ...toPipelineResult(aggregate(skipAll([jobOf("Build", [nodeStep("s", "")])]))),
            event: {kind: EEventKind.push, branch: "feature/x"},
            triggered: false
        };

        expect(renderReport(result, EReportFormat.text)).toBe(
            "Pipeline CI (run run-1): PASSED\n" +
            "Event: push to feature/x\n" +
            "No trigger matched the event; no job ran.\n" +
            "  [SKIPPED] Build\n");
    });

    it("renders JSON", () => {
        const result: IPipelineResult = applyUploadOutcome(toPipelineResult(aggregate(mapOf(build, test))),
            {sink: "file", ok: true}, true);

        const json: {
            status: string,
            triggered: boolean,
            jobs: Array<{name: string, status: string, firstFailureIndex?: number, steps: Array<{exitCode: number}>}>,
            upload: {sink: string, ok: boolean}
        } = JSON.parse(renderReport(result, EReportFormat.json));

        expect(json.status).toBe("failed");
        expect(json.triggered).toBe(true);
        expect(_.map(json.jobs, "name")).toEqual(["Build", "Test"]);
        expect(json.jobs[1].status).toBe("failed");
        expect(json.jobs[1].firstFailureIndex).toBe(1);
        expect(json.jobs[1].steps[1].exitCode).toBe(101);
        expect(json.upload).toEqual({sink: "file", ok: true});
    });
});
