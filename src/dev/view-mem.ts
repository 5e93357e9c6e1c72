import { readFile } from "node:fs/promises";
import { MemoryConsts } from "../noc/memory.js";
import { formatMemoryLine, type MemoryImageCells, parseMemoryImage } from "../utils/memory-image-format.js";
import { isMainModule } from "./main-module.js";

/**
 * Parse `12`, `0x1c` or an inclusive range `0-5` / `0x10-0x1f`.
 */
export function parseAddressSelector(selector: string): number[] {
    const bounds = selector.split("-");

    if (bounds.length > 2 || bounds.some((bound) => bound.trim().length === 0)) {
        throw new Error(`Invalid address '${selector}'`);
    }

    const values = bounds.map((bound) => {
        const value = Number(bound.trim());

        if (!Number.isInteger(value) || value < 0) {
            throw new Error(`Invalid address '${bound}'`);
        }

        return value;
    });

    const start = values[0];

    if (values.length === 1) {
        return [start];
    }

    const end = values[1];

    if (end < start) {
        throw new Error(`Invalid address range '${selector}'`);
    }

    const addresses: number[] = [];

    for (let address = start; address <= end; address++) {
        addresses.push(address);
    }

    return addresses;
}

/**
 * One line per requested cell, with the 8-byte segments split apart (segment 0 first).
 * Cells absent from the dump are reported as such.
 */
export function formatCellView(cells: MemoryImageCells, addresses: readonly number[]): string[] {
    const byAddress = new Map(cells);
    const lines: string[] = [];

    for (const address of addresses) {
        const data = byAddress.get(address);

        if (data === undefined) {
            lines.push(`@${address.toString(16).padStart(4, "0")} (not present)`);
            continue;
        }

        const segments: string[] = [];

        for (let offset = 0; offset < MemoryConsts.CELL_BYTES; offset += MemoryConsts.SEGMENT_BYTES) {
            segments.push(data.subarray(offset, offset + MemoryConsts.SEGMENT_BYTES).toString("hex"));
        }

        lines.push(`${formatMemoryLine(address, data)} | ${segments.join(" ")}`);
    }

    return lines;
}

export async function viewMemory(path: string, selector: string): Promise<string[]> {
    const cells = parseMemoryImage(await readFile(path, "utf8"), Number.MAX_SAFE_INTEGER, path);

    return formatCellView(cells, parseAddressSelector(selector));
}

export function printViewHelp(): void {
    console.log("Usage: view-mem <dump-file> <address|start-end>");
    console.log("    view-mem out_mem/0_1_mem_config.txt 2");
    console.log("    view-mem out_mem/0_1_mem_config.txt 0x10");
    console.log("    view-mem out_mem/0_1_mem_config.txt 0-5");
}

/* v8 ignore start -- @preserve */
if (isMainModule(import.meta.url)) {
    const [path, selector] = process.argv.slice(2);

    if (path === undefined || selector === undefined || path === "help") {
        printViewHelp();
    } else {
        for (const line of await viewMemory(path, selector)) {
            console.log(line);
        }
    }
}
/* v8 ignore stop -- @preserve */
