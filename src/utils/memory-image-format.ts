/**
 * Memory image text format.
 *
 * One line per cell: `@<cell index hex> <64 hex digits>`.
 * Digits are in cell byte order: the first pair is byte 0, so a routing table row reads as its big-endian 256-bit word.
 *
 * Reading is lenient, like the hardware testbench loader:
 * - blank lines and lines not starting with `@` are skipped
 * - whitespace inside the payload is dropped
 * - short payloads are left-padded with zeros, long ones keep their last 64 digits
 * - cells outside the image capacity are skipped (with a warning)
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { NoCError, NoCErrorCode } from "../noc/errors.js";
import { MemoryConsts, type MemoryImage } from "../noc/memory.js";
import { logger } from "./logger.js";

const NS = "memory-image-format";

const CELL_HEX_DIGITS = MemoryConsts.CELL_BYTES * 2;
const ADDRESS_MIN_DIGITS = 4;
const HEX_RE = /^[0-9a-fA-F]*$/;

export type MemoryImageCells = [cell: number, data: Buffer][];

/**
 * @param capacity Cells at or above this index are skipped
 * @param source Name used in messages (file path)
 */
export function parseMemoryImage(text: string, capacity: number = MemoryConsts.DEFAULT_CAPACITY, source = "<memory image>"): MemoryImageCells {
    const cells: MemoryImageCells = [];
    const lines = text.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i].trim();

        if (line.length === 0 || !line.startsWith("@")) {
            continue;
        }

        const [addressToken, ...rest] = line.split(/\s+/);
        const addressHex = addressToken.slice(1);

        if (addressHex.length === 0 || !HEX_RE.test(addressHex)) {
            throw new NoCError(NoCErrorCode.MALFORMED_IMAGE, `${source}:${i + 1}: invalid cell address '${addressToken}'`);
        }

        let payload = rest.join("");

        if (!HEX_RE.test(payload)) {
            throw new NoCError(NoCErrorCode.MALFORMED_IMAGE, `${source}:${i + 1}: invalid hex payload`);
        }

        const cell = Number.parseInt(addressHex, 16);

        if (cell >= capacity) {
            logger.warning(`${source}:${i + 1}: cell ${cell} outside capacity ${capacity}, skipped`, NS);
            continue;
        }

        if (payload.length < CELL_HEX_DIGITS) {
            payload = payload.padStart(CELL_HEX_DIGITS, "0");
        } else if (payload.length > CELL_HEX_DIGITS) {
            payload = payload.slice(-CELL_HEX_DIGITS);
        }

        cells.push([cell, Buffer.from(payload, "hex")]);
    }

    return cells;
}

export function formatMemoryLine(cell: number, data: Buffer): string {
    return `@${cell.toString(16).padStart(ADDRESS_MIN_DIGITS, "0")} ${data.toString("hex")}`;
}

/**
 * @param count Number of cells from 0, defaults to the image size
 */
export function serializeMemoryImage(memory: MemoryImage, count = memory.size): string {
    let out = "";

    for (const [cell, data] of memory.entries(count)) {
        out += `${formatMemoryLine(cell, data)}\n`;
    }

    return out;
}

export async function readMemoryImageFile(path: string, capacity: number = MemoryConsts.DEFAULT_CAPACITY): Promise<MemoryImageCells> {
    logger.debug(() => `Loading memory image ${path}`, NS);

    return parseMemoryImage(await readFile(path, "utf8"), capacity, path);
}

export async function writeMemoryImageFile(path: string, memory: MemoryImage, count = memory.size): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, serializeMemoryImage(memory, count), "utf8");
}
