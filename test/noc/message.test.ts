import { describe, expect, it } from "vitest";
import { NoCError, NoCErrorCode } from "../../src/noc/errors.js";
import {
    createDisabledNoCMessage,
    createNoCMessage,
    decodeNoCMessage,
    encodeNoCMessage,
    getGroupSize,
    packRoutingRow,
    unpackRoutingRow,
} from "../../src/noc/message.js";

describe("NoC message", () => {
    it("creates with defaults", () => {
        expect(createNoCMessage()).toStrictEqual({
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
        });
        expect(encodeNoCMessage(createDisabledNoCMessage())).toStrictEqual(0n);
        expect(getGroupSize(createNoCMessage({ constRaw: 3 }))).toStrictEqual(4);
    });

    it("places fields at their bit offsets", () => {
        expect(encodeNoCMessage(createNoCMessage({ y: -1 }))).toStrictEqual((63n << 6n) | (1n << 32n) | (1n << 72n));
        expect(encodeNoCMessage(createNoCMessage({ cnt: 0, en: false, a0: 0x3fff }))).toStrictEqual(0x3fffn << 18n);
        expect(encodeNoCMessage(createNoCMessage({ cnt: 0, en: false, handshake: true, tagId: 0xab }))).toStrictEqual((1n << 63n) | (0xabn << 64n));
        expect(encodeNoCMessage(createNoCMessage({ cnt: 0, en: false, s: true, q: true, lvds: 2 }))).toStrictEqual(0b101001n);
        expect(encodeNoCMessage(createNoCMessage({ cnt: 0, en: false, aOffset: -2048, constRaw: 127 }))).toStrictEqual(
            (0x800n << 44n) | (0x7fn << 56n),
        );
        expect(encodeNoCMessage(createNoCMessage({ cnt: 0, en: false, reserved: 1n }))).toStrictEqual(1n << 73n);
    });

    it("decodes what it encodes, including signed and reserved fields", () => {
        const message = createNoCMessage({
            s: true,
            e: true,
            lvds: 3,
            y: -32,
            x: 31,
            a0: 1234,
            cnt: 4095,
            aOffset: -5,
            constRaw: 9,
            handshake: true,
            tagId: 255,
            reserved: (1n << 55n) - 1n,
        });

        expect(decodeNoCMessage(encodeNoCMessage(message))).toStrictEqual(message);
    });

    it("ignores bits above 127 when decoding", () => {
        const message = createNoCMessage({ x: -3, tagId: 7 });

        expect(decodeNoCMessage((1n << 130n) | encodeNoCMessage(message))).toStrictEqual(message);
    });

    it("rejects out-of-range fields instead of masking them", () => {
        expect(() => encodeNoCMessage(createNoCMessage({ y: 32 }))).toThrowError("Field y=32 out of range [-32..31]");
        expect(() => encodeNoCMessage(createNoCMessage({ x: -33 }))).toThrowError("Field x=-33 out of range [-32..31]");
        expect(() => encodeNoCMessage(createNoCMessage({ a0: -1 }))).toThrowError("Field a0=-1 out of range [0..16383]");
        expect(() => encodeNoCMessage(createNoCMessage({ cnt: 4096 }))).toThrowError("Field cnt=4096 out of range [0..4095]");
        expect(() => encodeNoCMessage(createNoCMessage({ aOffset: 2048 }))).toThrowError("Field aOffset=2048 out of range [-2048..2047]");
        expect(() => encodeNoCMessage(createNoCMessage({ constRaw: 128 }))).toThrowError("Field constRaw=128 out of range [0..127]");
        expect(() => encodeNoCMessage(createNoCMessage({ tagId: 256 }))).toThrowError("Field tagId=256 out of range [0..255]");
        expect(() => encodeNoCMessage(createNoCMessage({ lvds: 1.5 }))).toThrowError("Field lvds=1.5 out of range [0..3]");
        expect(() => encodeNoCMessage(createNoCMessage({ reserved: 1n << 55n }))).toThrowError("Field reserved=");

        try {
            encodeNoCMessage(createNoCMessage({ tagId: -1 }));
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(NoCError);
            expect(error instanceof NoCError ? error.code : undefined).toStrictEqual(NoCErrorCode.INVALID_FIELD);
        }
    });

    describe("routing row", () => {
        it("stores the low message in the trailing 16 bytes, big-endian", () => {
            const row = packRoutingRow(createNoCMessage(), createDisabledNoCMessage());
            const expected = Buffer.alloc(32);

            // en (bit 72) and cnt=1 (bit 32)
            expected[22] = 0x01;
            expected[27] = 0x01;

            expect(row).toStrictEqual(expected);
        });

        it("stores the high message in the leading 16 bytes", () => {
            const row = packRoutingRow(createDisabledNoCMessage(), createNoCMessage({ cnt: 0, en: false, s: true }));

            expect(row[15]).toStrictEqual(0x01);
            expect(row.subarray(16)).toStrictEqual(Buffer.alloc(16));
        });

        it("unpacks both halves", () => {
            const low = createNoCMessage({ y: 1, x: -1, cnt: 16, tagId: 3, handshake: true });
            const high = createNoCMessage({ a0: 100, aOffset: 4, constRaw: 1 });

            expect(unpackRoutingRow(packRoutingRow(low, high))).toStrictEqual([low, high]);
        });

        it("rejects rows that are not one cell", () => {
            expect(() => unpackRoutingRow(Buffer.alloc(16))).toThrowError("Routing row must be 32 bytes, got 16");
        });
    });
});
