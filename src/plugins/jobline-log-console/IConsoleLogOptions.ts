import {z} from "zod";
import {commonLogOptionsSchema} from "../../public/options/logging/ICommonLogOptions";

/**
 * Console output options.
 */
export const consoleLogOptionsSchema = commonLogOptionsSchema.extend({

    /**
     * Whether to colorize the logs.
     *
     * Default: true
     */
    colorize: z.boolean().default(true),

    /**
     * Suppresses all output of this transport.
     *
     * Default: false
     */
    silent: z.boolean().default(false)
}).strict();

export type IConsoleLogOptions = z.infer<typeof consoleLogOptionsSchema>;
