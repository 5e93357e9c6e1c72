import { MemoryConsts } from "../noc/memory.js";
import { decodeNoCMessage, getGroupSize, type NoCMessage, NoCMessageConsts, unpackRoutingRow } from "../noc/message.js";
import { isMainModule } from "./main-module.js";

const flag = (value: boolean): number => (value ? 1 : 0);

/**
 * Named fields of a message, one per line, signed fields shown signed.
 */
export function formatNoCMessage(message: NoCMessage): string[] {
    return [
        `S=${flag(message.s)} T=${flag(message.t)} E=${flag(message.e)} Q=${flag(message.q)} LVDS=${message.lvds}`,
        `Y=${message.y} X=${message.x}`,
        `A0=${message.a0} cnt=${message.cnt} A_offset=${message.aOffset} Const=${message.constRaw} (groups of ${getGroupSize(message)})`,
        `handshake=${flag(message.handshake)} tag_id=${message.tagId} en=${flag(message.en)}`,
        `reserved=0x${message.reserved.toString(16)}`,
    ];
}

/**
 * Decode a routing table row (64 hex digits, as found in a memory dump) or a single message word (32 hex digits).
 */
export function decodeRoutingWord(hex: string): string[] {
    const digits = hex.replace(/\s+/g, "").replace(/^0x/i, "");

    if (!/^[0-9a-fA-F]+$/.test(digits)) {
        throw new Error(`Invalid hex '${hex}'`);
    }

    if (digits.length === NoCMessageConsts.MESSAGE_BYTES * 2) {
        return formatNoCMessage(decodeNoCMessage(BigInt(`0x${digits}`)));
    }

    if (digits.length === MemoryConsts.CELL_BYTES * 2) {
        const [low, high] = unpackRoutingRow(Buffer.from(digits, "hex"));
        const indent = (line: string): string => `    ${line}`;

        return ["low (even index):", ...formatNoCMessage(low).map(indent), "high (odd index):", ...formatNoCMessage(high).map(indent)];
    }

    throw new Error(`Expected ${MemoryConsts.CELL_BYTES * 2} hex digits (row) or ${NoCMessageConsts.MESSAGE_BYTES * 2} (message), got ${digits.length}`);
}

export function printDecodeHelp(): void {
    console.log("Usage: decode-row <64-hex row | 32-hex message>");
    console.log("    decode-row 000000000000000000000000000000000000000000000101000000040003f040");
}

/* v8 ignore start -- @preserve */
if (isMainModule(import.meta.url)) {
    const [hex] = process.argv.slice(2);

    if (hex === undefined || hex === "help") {
        printDecodeHelp();
    } else {
        for (const line of decodeRoutingWord(hex)) {
            console.log(line);
        }
    }
}
/* v8 ignore stop -- @preserve */
