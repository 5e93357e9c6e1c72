import { MemoryConsts } from "./memory.js";
import { SendMode } from "./primitive.js";

/** The router reads a zero count as one unit */
export function normalizeCount(cnt: number): number {
    return cnt === 0 ? 1 : cnt;
}

/**
 * Expand a message's compact addressing into its per-unit address values.
 *
 * `A[0] = a0`, then `+1` per unit, plus `aOffset - 1` whenever a new group of `constRaw + 1` units starts:
 * `aOffset = 1` gives contiguous addresses, larger values leave gaps between groups.
 *
 * Pure: every call restarts from `a0`.
 */
export function* generateAddresses(a0: number, cnt: number, aOffset: number, constRaw: number): Generator<number, void, undefined> {
    const count = normalizeCount(cnt);
    const groupSize = constRaw + 1;
    let a = a0;

    for (let k = 0; k < count; k++) {
        if (k > 0) {
            a += 1;

            if (k % groupSize === 0) {
                a += aOffset - 1;
            }
        }

        yield a;
    }
}

/** Bytes moved per address unit */
export function getUnitBytes(mode: SendMode): number {
    return mode === SendMode.CELL ? MemoryConsts.SEGMENT_BYTES : 1;
}

/**
 * Map an address unit value to a memory location, relative to a base cell.
 * Floor division keeps negative units (negative strides) below the base cell.
 */
export function mapAddress(mode: SendMode, base: number, a: number): [cell: number, offset: number] {
    const unitsPerCell = MemoryConsts.CELL_BYTES / getUnitBytes(mode);
    const unitInCell = ((a % unitsPerCell) + unitsPerCell) % unitsPerCell;

    return [base + Math.floor(a / unitsPerCell), unitInCell * getUnitBytes(mode)];
}

/**
 * Linear source read position for a Send: units are consumed contiguously from `sendAddr`, across all messages.
 */
export class SourceCursor {
    readonly #mode: SendMode;
    readonly #base: number;
    #unit = 0;

    constructor(mode: SendMode, base: number) {
        this.#mode = mode;
        this.#base = base;
    }

    get unit(): number {
        return this.#unit;
    }

    /**
     * Location of the next unit to read, then move past it.
     */
    public next(): [cell: number, offset: number] {
        const location = mapAddress(this.#mode, this.#base, this.#unit);

        this.#unit += 1;

        return location;
    }

    /**
     * Move past `units` without reading them (disabled messages keep their source slice).
     */
    public skip(units: number): void {
        this.#unit += units;
    }
}
