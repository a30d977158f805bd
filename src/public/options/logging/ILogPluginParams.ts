/**
 * What every log plugin is given.
 */
export interface ILogPluginParams {
    /**
     * The plugin's own section of the `log` configuration: an object or an array of objects.
     */
    options: unknown;

    /**
     * Shown with every log line, e.g. `CI/<run id>/Build`.
     */
    label: string;

    workingDir: string;
    outDir: string;
}
