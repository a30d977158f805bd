import {z} from "zod";
import {commonLogOptionsSchema} from "../../public/options/logging/ICommonLogOptions";
import {ELogOutputFormat} from "../../public/options/logging/ELogOutputFormat";

/**
 * File output options
 */
export const fileLogOptionsSchema = commonLogOptionsSchema.extend({
    /**
     * The file to write the logs to, relative to the working directory.
     *
     * Default: ${runner:out-dir}/jobline.log
     */
    path: z.string().min(1).optional(),

    format: z.nativeEnum(ELogOutputFormat).default(ELogOutputFormat.json),

    /**
     * The maximum size of the file, in bytes.
     *
     * Default: 10mb
     */
    maxsize: z.number().int().positive().default(10 * 1024 * 1024),

    /**
     * The maximum number of files before rotation occurs.
     *
     * Default: 1
     */
    maxFiles: z.number().int().positive().default(1),

    /**
     * Whether the rotated files are zipped.
     *
     * Default: false
     */
    zippedArchive: z.boolean().default(false)
}).strict();

export type IFileLogOptions = z.infer<typeof fileLogOptionsSchema>;
