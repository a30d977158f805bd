import path = require("path");
import fs = require("fs");

export class PathUtils {

    /**
     * Searches for the given relative path starting from the fromDir and walking upwards
     * until the root has been reached.
     */
    static searchForPath(fromDir: string, searchForRelativePath: string): string | undefined {
        let absolutePath: string = path.resolve(fromDir);
        const rootPath: string = path.parse(absolutePath).root;

        while (absolutePath !== rootPath) {
            const candidate: string = path.resolve(absolutePath, searchForRelativePath);
            if (fs.existsSync(candidate)) {
                return candidate;
            }
            absolutePath = path.resolve(absolutePath, "../");
        }

        // we did not actually check the root path. Check that before we throw in the towel.
        const atRoot: string = path.resolve(rootPath, searchForRelativePath);
        return fs.existsSync(atRoot) ? atRoot : undefined;
    }

    /**
     * Returns the path as is when it is absolute, otherwise resolves it against the given directory.
     */
    static getAsAbsolutePath(inputPath: string, relativeDir: string): string {
        if (path.isAbsolute(inputPath)) {
            return inputPath;
        } else {
            return path.resolve(relativeDir, inputPath);
        }
    }
}
