import { describe, expect, it } from "vitest";
import { generateAddresses, getUnitBytes, mapAddress, normalizeCount, SourceCursor } from "../../src/noc/address.js";
import { SendMode } from "../../src/noc/primitive.js";

describe("NoC addressing", () => {
    describe("generateAddresses", () => {
        it("produces contiguous addresses with a unit offset", () => {
            expect(Array.from(generateAddresses(7, 3, 1, 0))).toStrictEqual([7, 8, 9]);
        });

        it("strides by the offset with single-unit groups", () => {
            expect(Array.from(generateAddresses(0, 4, 5, 0))).toStrictEqual([0, 5, 10, 15]);
        });

        it("leaves gaps between groups", () => {
            expect(Array.from(generateAddresses(0, 6, 3, 1))).toStrictEqual([0, 1, 4, 5, 8, 9]);
        });

        it("walks backwards with a negative offset", () => {
            expect(Array.from(generateAddresses(10, 3, -3, 0))).toStrictEqual([10, 7, 4]);
        });

        it("treats a zero count as one unit", () => {
            expect(normalizeCount(0)).toStrictEqual(1);
            expect(Array.from(generateAddresses(12, 0, 5, 0))).toStrictEqual([12]);
        });

        it("restarts from a0 on every call", () => {
            const first = generateAddresses(2, 4, 2, 1);

            expect(first.next().value).toStrictEqual(2);
            expect(Array.from(generateAddresses(2, 4, 2, 1))).toStrictEqual([2, 3, 5, 6]);
            expect(Array.from(first)).toStrictEqual([3, 5, 6]);
        });
    });

    describe("mapAddress", () => {
        it("maps cell-mode units to 8-byte segments", () => {
            expect(getUnitBytes(SendMode.CELL)).toStrictEqual(8);
            expect(mapAddress(SendMode.CELL, 2, 0)).toStrictEqual([2, 0]);
            expect(mapAddress(SendMode.CELL, 2, 5)).toStrictEqual([3, 8]);
            expect(mapAddress(SendMode.CELL, 4, -1)).toStrictEqual([3, 24]);
        });

        it("maps neuron-mode units to bytes", () => {
            expect(getUnitBytes(SendMode.NEURON)).toStrictEqual(1);
            expect(mapAddress(SendMode.NEURON, 2, 33)).toStrictEqual([3, 1]);
            expect(mapAddress(SendMode.NEURON, 1, -32)).toStrictEqual([0, 0]);
        });
    });

    describe("SourceCursor", () => {
        it("consumes units contiguously and skips", () => {
            const cursor = new SourceCursor(SendMode.CELL, 1);

            expect(cursor.next()).toStrictEqual([1, 0]);
            expect(cursor.next()).toStrictEqual([1, 8]);

            cursor.skip(3);

            expect(cursor.unit).toStrictEqual(5);
            expect(cursor.next()).toStrictEqual([2, 8]);
        });
    });
});
