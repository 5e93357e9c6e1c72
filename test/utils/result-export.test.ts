import { rmSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NoCSimulator } from "../../src/simulator/noc-simulator.js";
import { serializeMemoryImage } from "../../src/utils/memory-image-format.js";
import { exportResults, getDumpFileName } from "../../src/utils/result-export.js";
import { makeTempDir, recvOp, sequentialCell } from "../utils.js";

describe("Result export", () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir("EXPORT");
    });

    afterEach(() => {
        rmSync(dir, { force: true, recursive: true });
    });

    it("names dumps after core coordinates", () => {
        expect(getDumpFileName(3, 12)).toStrictEqual("3_12_mem_config.txt");
    });

    it("writes one full-capacity dump per core, row-major", async () => {
        const sim = new NoCSimulator({ height: 2, width: 1, memoryCells: 8 }, [{ y: 1, x: 0, primQueue: [], image: [[1, sequentialCell(0)]] }]);
        const paths = await exportResults(sim, join(dir, "out"));

        expect(paths).toStrictEqual([join(dir, "out", "0_0_mem_config.txt"), join(dir, "out", "1_0_mem_config.txt")]);
        expect(await readFile(paths[0], "utf8")).toStrictEqual(serializeMemoryImage(sim.getCore(0, 0).memory, 8));
        expect(await readFile(paths[1], "utf8")).toStrictEqual(serializeMemoryImage(sim.getCore(1, 0).memory, 8));
    });

    it("dumps every cell of cores that were never written", async () => {
        const sim = new NoCSimulator({ height: 1, width: 2, memoryCells: 8 }, [{ y: 0, x: 1, primQueue: [recvOp(3, 1)] }]);

        sim.run();

        const [path] = await exportResults(sim, dir);

        expect((await readFile(path, "utf8")).split("\n")).toStrictEqual([
            `@0000 ${"0".repeat(64)}`,
            `@0001 ${"0".repeat(64)}`,
            `@0002 ${"0".repeat(64)}`,
            `@0003 ${"0".repeat(64)}`,
            `@0004 ${"0".repeat(64)}`,
            `@0005 ${"0".repeat(64)}`,
            `@0006 ${"0".repeat(64)}`,
            `@0007 ${"0".repeat(64)}`,
            "",
        ]);
    });

    it("stops at the highest written cell when trimming", async () => {
        const sim = new NoCSimulator({ height: 2, width: 1, memoryCells: 8 }, [{ y: 1, x: 0, primQueue: [], image: [[1, sequentialCell(0)]] }]);
        const paths = await exportResults(sim, dir, { trim: true });

        expect(await readFile(paths[0], "utf8")).toStrictEqual("");
        expect(await readFile(paths[1], "utf8")).toStrictEqual(`@0000 ${"0".repeat(64)}\n@0001 ${sequentialCell(0).toString("hex")}\n`);
    });
});
