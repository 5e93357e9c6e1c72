import { NoCError, NoCErrorCode } from "./errors.js";

/**
 * const enum with sole purpose of avoiding "magic numbers" in code for well-known values
 */
export const enum MemoryConsts {
    /** 256-bit wide cells */
    CELL_BYTES = 32,
    /** 8B segments per cell (cell mode unit) */
    SEGMENTS_PER_CELL = 4,
    SEGMENT_BYTES = 8,
    /** Cells per core SRAM (768KiB) */
    DEFAULT_CAPACITY = 24576,
}

/**
 * Per-core byte-addressable storage, organized in 32-byte cells.
 *
 * Cells never written read back as zeros. `size` is one past the highest cell ever written,
 * which is what an export covers by default.
 */
export class MemoryImage {
    readonly #cells = new Map<number, Buffer>();
    readonly #capacity: number;
    #size = 0;

    constructor(capacity: number = MemoryConsts.DEFAULT_CAPACITY) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new NoCError(NoCErrorCode.INVALID_CONFIG, `Invalid memory capacity ${capacity}`);
        }

        this.#capacity = capacity;
    }

    get capacity(): number {
        return this.#capacity;
    }

    get size(): number {
        return this.#size;
    }

    /**
     * Indexes of cells holding data, ascending.
     */
    public populatedCells(): number[] {
        return Array.from(this.#cells.keys()).sort((a, b) => a - b);
    }

    public isInRange(cell: number): boolean {
        return Number.isInteger(cell) && cell >= 0 && cell < this.#capacity;
    }

    /**
     * @returns A copy of the cell content (32 bytes)
     */
    public readCell(cell: number): Buffer {
        this.#checkCell(cell);

        const data = this.#cells.get(cell);

        return data === undefined ? Buffer.alloc(MemoryConsts.CELL_BYTES) : Buffer.from(data);
    }

    /**
     * Read a byte window that may span several cells.
     */
    public readBytes(cell: number, offset: number, length: number): Buffer {
        if (!Number.isInteger(offset) || offset < 0 || offset >= MemoryConsts.CELL_BYTES) {
            throw new NoCError(NoCErrorCode.ADDRESS_OUT_OF_RANGE, `Byte offset ${offset} outside cell`);
        }

        const out = Buffer.alloc(length);
        let written = 0;

        while (written < length) {
            const chunk = Math.min(length - written, MemoryConsts.CELL_BYTES - offset);

            this.readCell(cell).copy(out, written, offset, offset + chunk);

            written += chunk;
            cell += 1;
            offset = 0;
        }

        return out;
    }

    /**
     * Replace a whole cell.
     */
    public writeCell(cell: number, data: Buffer): void {
        if (data.byteLength !== MemoryConsts.CELL_BYTES) {
            throw new Error(`Cell data must be ${MemoryConsts.CELL_BYTES} bytes, got ${data.byteLength}`);
        }

        data.copy(this.#getCellBuffer(cell));
    }

    /**
     * Write one 8-byte segment [0..3] of a cell.
     */
    public write8(cell: number, segment: number, data: Buffer): void {
        if (!Number.isInteger(segment) || segment < 0 || segment >= MemoryConsts.SEGMENTS_PER_CELL) {
            throw new Error(`Invalid segment index ${segment}`);
        }

        if (data.byteLength !== MemoryConsts.SEGMENT_BYTES) {
            throw new Error(`Segment data must be ${MemoryConsts.SEGMENT_BYTES} bytes, got ${data.byteLength}`);
        }

        data.copy(this.#getCellBuffer(cell), segment * MemoryConsts.SEGMENT_BYTES);
    }

    /**
     * Write a single byte [0..31] of a cell.
     */
    public write1(cell: number, offset: number, value: number): void {
        if (!Number.isInteger(offset) || offset < 0 || offset >= MemoryConsts.CELL_BYTES) {
            throw new Error(`Invalid byte offset ${offset}`);
        }

        this.#getCellBuffer(cell).writeUInt8(value, offset);
    }

    /**
     * Replace the whole content with the given cells. Anything not listed becomes zero.
     */
    public load(cells: Iterable<[cell: number, data: Buffer]>): void {
        this.clear();

        for (const [cell, data] of cells) {
            this.writeCell(cell, data);
        }
    }

    /**
     * @param count Number of cells from 0, defaults to `size`
     */
    public *entries(count = this.#size): Generator<[cell: number, data: Buffer]> {
        for (let cell = 0; cell < count; cell++) {
            yield [cell, this.readCell(cell)];
        }
    }

    public clear(): void {
        this.#cells.clear();
        this.#size = 0;
    }

    #checkCell(cell: number): void {
        if (!this.isInRange(cell)) {
            throw new NoCError(NoCErrorCode.ADDRESS_OUT_OF_RANGE, `Cell address ${cell} out of range [0..${this.#capacity - 1}]`);
        }
    }

    #getCellBuffer(cell: number): Buffer {
        this.#checkCell(cell);

        let data = this.#cells.get(cell);

        if (data === undefined) {
            data = Buffer.alloc(MemoryConsts.CELL_BYTES);

            this.#cells.set(cell, data);
        }

        if (cell >= this.#size) {
            this.#size = cell + 1;
        }

        return data;
    }
}
