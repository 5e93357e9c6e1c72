import type { MemoryImage } from "./memory.js";
import { createDisabledNoCMessage, type NoCMessage, packRoutingRow, unpackRoutingRow } from "./message.js";

/**
 * Typed view over the routing table stored inside a core's own memory.
 * Two messages per cell row: even indexes in the low half, odd indexes in the high half.
 *
 * Writes go straight to the underlying image, so a Send reading its table right after an inline write sees it.
 */
export class RoutingTable {
    readonly #memory: MemoryImage;

    constructor(memory: MemoryImage) {
        this.#memory = memory;
    }

    /**
     * Write `ceil(n/2)` rows from `base`. With an odd count, the last row's high half is a disabled all-zero message.
     */
    public writeMessages(base: number, messages: readonly NoCMessage[]): void {
        for (let i = 0; i < messages.length; i += 2) {
            const low = messages[i];
            const high = i + 1 < messages.length ? messages[i + 1] : createDisabledNoCMessage();

            this.#memory.writeCell(base + i / 2, packRoutingRow(low, high));
        }
    }

    public readMessage(base: number, index: number): NoCMessage {
        const [low, high] = unpackRoutingRow(this.#memory.readCell(base + Math.floor(index / 2)));

        return index % 2 === 0 ? low : high;
    }

    public readMessages(base: number, count: number): NoCMessage[] {
        const messages: NoCMessage[] = [];

        for (let i = 0; i < count; i++) {
            messages.push(this.readMessage(base, i));
        }

        return messages;
    }
}
