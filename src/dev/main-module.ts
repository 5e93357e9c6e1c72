import { existsSync, realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

/**
 * Whether the module at `moduleUrl` is the script node was started with (bin symlinks resolved).
 */
export function isMainModule(moduleUrl: string): boolean {
    const entry = process.argv[1];

    if (entry === undefined || !existsSync(entry)) {
        return false;
    }

    return moduleUrl === pathToFileURL(realpathSync(entry)).href;
}
