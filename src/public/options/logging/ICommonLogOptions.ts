import {z} from "zod";
import {ELogLevel} from "./ELogLevel";
import {ELogOutputFormat} from "./ELogOutputFormat";

export const commonLogOptionsSchema = z.object({
    /**
     * Should show timestamp?
     *
     * Default: true
     */
    timestamp: z.boolean().default(true),

    /**
     * The level of logging that will be output.
     *
     * Values: error|warn|info|verbose|debug|silly
     * Default: info
     */
    level: z.nativeEnum(ELogLevel).default(ELogLevel.info),

    /**
     * What format should the logs be output in?
     *
     * Values: simple, json
     */
    format: z.nativeEnum(ELogOutputFormat).optional()
});

export type ICommonLogOptions = z.infer<typeof commonLogOptionsSchema>;
