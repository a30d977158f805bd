import {ILogger} from "../api/ILogger";

/**
 * What every checkout and report plugin is given.
 */
export interface IPluginParams {
    /**
     * The plugin's own section of the pipeline document. Plugins validate it themselves.
     */
    options: unknown;

    /**
     * The directory relative paths in the options are resolved against.
     */
    workingDir: string;

    /**
     * Where jobline keeps the output of this run.
     */
    outDir: string;

    runId: string;
    logger: ILogger;
}
