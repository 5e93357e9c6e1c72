import { assertFieldRange, NoCError, NoCErrorCode } from "./errors.js";
import { MemoryConsts } from "./memory.js";

/**
 * const enum with sole purpose of avoiding "magic numbers" in code for well-known values
 *
 * Bit offsets of the 128-bit message descriptor (LSB = bit 0), as laid out by the router hardware.
 */
export const enum NoCMessageConsts {
    MESSAGE_BITS = 128,
    MESSAGE_BYTES = 16,

    S_BIT = 0,
    T_BIT = 1,
    E_BIT = 2,
    Q_BIT = 3,
    LVDS_SHIFT = 4,
    LVDS_WIDTH = 2,
    Y_SHIFT = 6,
    Y_WIDTH = 6,
    X_SHIFT = 12,
    X_WIDTH = 6,
    A0_SHIFT = 18,
    A0_WIDTH = 14,
    CNT_SHIFT = 32,
    CNT_WIDTH = 12,
    A_OFFSET_SHIFT = 44,
    A_OFFSET_WIDTH = 12,
    CONST_SHIFT = 56,
    CONST_WIDTH = 7,
    HANDSHAKE_BIT = 63,
    TAG_ID_SHIFT = 64,
    TAG_ID_WIDTH = 8,
    EN_BIT = 72,
    RESERVED_SHIFT = 73,
    RESERVED_WIDTH = 55,
}

/**
 * One routing table entry: where a Send message goes and how its destination addresses progress.
 */
export type NoCMessage = {
    /** S: sparse payload marker. Stored only, sparse compression is not modeled */
    s: boolean;
    /** T: packet type. Stored only */
    t: boolean;
    /** E: end packet marker. Stored only */
    e: boolean;
    /** Q: relay/multicast marker. Stored only, multicast is not modeled */
    q: boolean;
    /** LVDS interface selector (2 bits). Stored only */
    lvds: number;
    /** Destination row (signed 6 bits) */
    y: number;
    /** Destination column (signed 6 bits) */
    x: number;
    /** First destination address unit (14 bits) */
    a0: number;
    /** Unit count (12 bits), 0 means 1 */
    cnt: number;
    /** Address distance between the last unit of a group and the first of the next one (signed 12 bits) */
    aOffset: number;
    /** Group size minus one (7 bits) */
    constRaw: number;
    /** Buffer at destination until a Recv with the same tag executed there */
    handshake: boolean;
    /** 8 bits */
    tagId: number;
    /** Disabled messages are skipped */
    en: boolean;
    /** Upper 55 bits, kept for bit-exact round trips */
    reserved: bigint;
};

const RESERVED_MAX = (1n << BigInt(NoCMessageConsts.RESERVED_WIDTH)) - 1n;
const MESSAGE_MASK = (1n << BigInt(NoCMessageConsts.MESSAGE_BITS)) - 1n;

/**
 * Build a message with the configuration defaults (single unit, enabled, everything else zeroed).
 */
export function createNoCMessage(fields: Partial<NoCMessage> = {}): NoCMessage {
    return {
        s: false,
        t: false,
        e: false,
        q: false,
        lvds: 0,
        y: 0,
        x: 0,
        a0: 0,
        cnt: 1,
        aOffset: 0,
        constRaw: 0,
        handshake: false,
        tagId: 0,
        en: true,
        reserved: 0n,
        ...fields,
    };
}

/**
 * All-zero descriptor, as found in an unused routing table half.
 */
export function createDisabledNoCMessage(): NoCMessage {
    return createNoCMessage({ cnt: 0, en: false });
}

export function getGroupSize(message: Pick<NoCMessage, "constRaw">): number {
    return message.constRaw + 1;
}

function readUnsigned(bits: bigint, shift: number, width: number): number {
    return Number((bits >> BigInt(shift)) & ((1n << BigInt(width)) - 1n));
}

function readSigned(bits: bigint, shift: number, width: number): number {
    const raw = readUnsigned(bits, shift, width);
    const signBit = 1 << (width - 1);

    return (raw ^ signBit) - signBit;
}

function readFlag(bits: bigint, bit: number): boolean {
    return ((bits >> BigInt(bit)) & 1n) === 1n;
}

function writeUnsigned(name: string, value: number, shift: number, width: number): bigint {
    assertFieldRange(name, value, 0, (1 << width) - 1);

    return BigInt(value) << BigInt(shift);
}

function writeSigned(name: string, value: number, shift: number, width: number): bigint {
    const limit = 1 << (width - 1);

    assertFieldRange(name, value, -limit, limit - 1);

    // two's complement within width
    return BigInt(value & ((1 << width) - 1)) << BigInt(shift);
}

function writeFlag(value: boolean, bit: number): bigint {
    return value ? 1n << BigInt(bit) : 0n;
}

/**
 * Decode a 128-bit descriptor. Bits above 127 are ignored.
 */
export function decodeNoCMessage(bits: bigint): NoCMessage {
    bits &= MESSAGE_MASK;

    return {
        s: readFlag(bits, NoCMessageConsts.S_BIT),
        t: readFlag(bits, NoCMessageConsts.T_BIT),
        e: readFlag(bits, NoCMessageConsts.E_BIT),
        q: readFlag(bits, NoCMessageConsts.Q_BIT),
        lvds: readUnsigned(bits, NoCMessageConsts.LVDS_SHIFT, NoCMessageConsts.LVDS_WIDTH),
        y: readSigned(bits, NoCMessageConsts.Y_SHIFT, NoCMessageConsts.Y_WIDTH),
        x: readSigned(bits, NoCMessageConsts.X_SHIFT, NoCMessageConsts.X_WIDTH),
        a0: readUnsigned(bits, NoCMessageConsts.A0_SHIFT, NoCMessageConsts.A0_WIDTH),
        cnt: readUnsigned(bits, NoCMessageConsts.CNT_SHIFT, NoCMessageConsts.CNT_WIDTH),
        aOffset: readSigned(bits, NoCMessageConsts.A_OFFSET_SHIFT, NoCMessageConsts.A_OFFSET_WIDTH),
        constRaw: readUnsigned(bits, NoCMessageConsts.CONST_SHIFT, NoCMessageConsts.CONST_WIDTH),
        handshake: readFlag(bits, NoCMessageConsts.HANDSHAKE_BIT),
        tagId: readUnsigned(bits, NoCMessageConsts.TAG_ID_SHIFT, NoCMessageConsts.TAG_ID_WIDTH),
        en: readFlag(bits, NoCMessageConsts.EN_BIT),
        reserved: bits >> BigInt(NoCMessageConsts.RESERVED_SHIFT),
    };
}

/**
 * Encode a descriptor into its 128-bit form.
 * Out-of-range field values are rejected with `InvalidField`, never masked into neighboring fields.
 */
export function encodeNoCMessage(message: NoCMessage): bigint {
    if (message.reserved < 0n || message.reserved > RESERVED_MAX) {
        throw new NoCError(NoCErrorCode.INVALID_FIELD, `Field reserved=${message.reserved} out of range [0..${RESERVED_MAX}]`);
    }

    return (
        writeFlag(message.s, NoCMessageConsts.S_BIT) |
        writeFlag(message.t, NoCMessageConsts.T_BIT) |
        writeFlag(message.e, NoCMessageConsts.E_BIT) |
        writeFlag(message.q, NoCMessageConsts.Q_BIT) |
        writeUnsigned("lvds", message.lvds, NoCMessageConsts.LVDS_SHIFT, NoCMessageConsts.LVDS_WIDTH) |
        writeSigned("y", message.y, NoCMessageConsts.Y_SHIFT, NoCMessageConsts.Y_WIDTH) |
        writeSigned("x", message.x, NoCMessageConsts.X_SHIFT, NoCMessageConsts.X_WIDTH) |
        writeUnsigned("a0", message.a0, NoCMessageConsts.A0_SHIFT, NoCMessageConsts.A0_WIDTH) |
        writeUnsigned("cnt", message.cnt, NoCMessageConsts.CNT_SHIFT, NoCMessageConsts.CNT_WIDTH) |
        writeSigned("aOffset", message.aOffset, NoCMessageConsts.A_OFFSET_SHIFT, NoCMessageConsts.A_OFFSET_WIDTH) |
        writeUnsigned("constRaw", message.constRaw, NoCMessageConsts.CONST_SHIFT, NoCMessageConsts.CONST_WIDTH) |
        writeFlag(message.handshake, NoCMessageConsts.HANDSHAKE_BIT) |
        writeUnsigned("tagId", message.tagId, NoCMessageConsts.TAG_ID_SHIFT, NoCMessageConsts.TAG_ID_WIDTH) |
        writeFlag(message.en, NoCMessageConsts.EN_BIT) |
        (message.reserved << BigInt(NoCMessageConsts.RESERVED_SHIFT))
    );
}

/**
 * Pack two descriptors into one 256-bit routing table row.
 * The row is stored big-endian: `low` ends up in bytes 16..31, `high` in bytes 0..15.
 */
export function packRoutingRow(low: NoCMessage, high: NoCMessage): Buffer {
    const row = Buffer.alloc(MemoryConsts.CELL_BYTES);
    const lowBits = encodeNoCMessage(low);
    const highBits = encodeNoCMessage(high);

    row.writeBigUInt64BE(highBits >> 64n, 0);
    row.writeBigUInt64BE(highBits & 0xffffffffffffffffn, 8);
    row.writeBigUInt64BE(lowBits >> 64n, 16);
    row.writeBigUInt64BE(lowBits & 0xffffffffffffffffn, 24);

    return row;
}

export function unpackRoutingRow(row: Buffer): [low: NoCMessage, high: NoCMessage] {
    if (row.byteLength !== MemoryConsts.CELL_BYTES) {
        throw new Error(`Routing row must be ${MemoryConsts.CELL_BYTES} bytes, got ${row.byteLength}`);
    }

    const highBits = (row.readBigUInt64BE(0) << 64n) | row.readBigUInt64BE(8);
    const lowBits = (row.readBigUInt64BE(16) << 64n) | row.readBigUInt64BE(24);

    return [decodeNoCMessage(lowBits), decodeNoCMessage(highBits)];
}
