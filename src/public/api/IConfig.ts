import {ISimpleStore} from "./ISimpleStore";
import {IPipelineDefinition} from "./IPipelineDefinition";
import {ILogger} from "./ILogger";

/**
 * Stores the configuration options that were supplied to jobline, as well as other derived data.
 */
export interface IConfig {

    /**
     * Stores the supplied configuration options.
     */
    options: ISimpleStore;

    /**
     * Identifies this pipeline run. Used in log labels and environment directory names.
     */
    runId: string;

    /**
     * This is the directory which we resolve all other relative directories with.
     */
    workingDir: string;

    /**
     * The configuration file that was used to load this config. Undefined if the config was loaded programmatically.
     */
    confFilePath?: string;

    /**
     * The validated pipeline. Only available once the config has been built.
     */
    readonly definition: IPipelineDefinition;

    /**
     * Logger for pipeline-level messages. Only available once the config has been built.
     */
    readonly logger: ILogger;
}
