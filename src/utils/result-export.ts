import { join } from "node:path";
import type { NoCSimulator } from "../simulator/noc-simulator.js";
import { logger } from "./logger.js";
import { writeMemoryImageFile } from "./memory-image-format.js";

const NS = "result-export";

export type ExportOptions = {
    /** Stop each dump at the highest cell ever written instead of the full capacity */
    trim?: boolean;
};

export function getDumpFileName(y: number, x: number): string {
    return `${y}_${x}_mem_config.txt`;
}

/**
 * Write one memory dump per core into `dir`, every cell of the capacity by default.
 * @returns written file paths, row-major
 */
export async function exportResults(simulator: NoCSimulator, dir: string, options: ExportOptions = {}): Promise<string[]> {
    const paths: string[] = [];

    for (const node of simulator.cores()) {
        const path = join(dir, getDumpFileName(node.y, node.x));

        await writeMemoryImageFile(path, node.memory, options.trim === true ? node.memory.size : node.memory.capacity);
        paths.push(path);
    }

    logger.info(`Wrote ${paths.length} memory dump(s) to ${dir}`, NS);

    return paths;
}
