#!/usr/bin/env node
import { NoCError } from "../noc/errors.js";
import type { RunSummary } from "../simulator/noc-simulator.js";
import { createSimulatorFromConfig, loadGridConfig } from "../utils/config-loader.js";
import { createConsoleLogger, logger, setLogger } from "../utils/logger.js";
import { exportResults } from "../utils/result-export.js";
import { decodeRoutingWord, printDecodeHelp } from "./decode-row.js";
import { isMainModule } from "./main-module.js";
import { printViewHelp, viewMemory } from "./view-mem.js";

const NS = "cli";

export type RunArgs = {
    config: string;
    outDir: string;
    /** Export memories after routing tables were seeded, before anything executes */
    emitSeededDir?: string;
    /** Stop after the seeded export */
    seedOnly: boolean;
    /** Dump each core up to its highest written cell instead of its full capacity */
    trim: boolean;
    verbose: boolean;
};

export function argToBool(arg: string): boolean {
    arg = arg.toLowerCase();

    return arg === "1" || arg === "true" || arg === "yes" || arg === "on";
}

function printHelp(shouldThrow: boolean): void {
    console.log("\nRun:");
    console.log("    noc-sim run --config <file.json|file.yaml> [--out-dir <dir>] [--emit-seeded-dir <dir>] [--seed-only] [--trim] [--verbose]");

    console.log("\nView:");
    console.log("    noc-sim view <dump-file> <address|start-end>");

    console.log("\nDecode:");
    console.log("    noc-sim decode <64-hex routing row | 32-hex message>");

    console.log("\n- Following ENV vars provide defaults: NOC_CONFIG (--config), NOC_OUT_DIR (--out-dir), NOC_VERBOSE (--verbose)");
    console.log("- Boolean ENV vars take any of the following forms (any other will be considered no/false): 1, true, yes, on");
    console.log("- A failed run exits with code 1 after printing the failing core, round and primitive index");

    if (shouldThrow) {
        throw new Error("Invalid parameters");
    }
}

/**
 * Parse `run` arguments. Environment variables provide defaults, flags override them.
 */
export function parseRunArgs(argv: readonly string[], env: NodeJS.ProcessEnv = {}): RunArgs {
    const args: RunArgs = {
        config: env.NOC_CONFIG ?? "",
        outDir: env.NOC_OUT_DIR ?? "out_mem",
        seedOnly: false,
        trim: false,
        verbose: env.NOC_VERBOSE !== undefined && argToBool(env.NOC_VERBOSE),
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        const value = (): string => {
            const next = argv[i + 1];

            if (next === undefined || next.startsWith("--")) {
                throw new Error(`Missing value for ${arg}`);
            }

            i += 1;

            return next;
        };

        switch (arg) {
            case "--config":
            case "-c": {
                args.config = value();
                break;
            }
            case "--out-dir": {
                args.outDir = value();
                break;
            }
            case "--emit-seeded-dir": {
                args.emitSeededDir = value();
                break;
            }
            case "--seed-only": {
                args.seedOnly = true;
                break;
            }
            case "--trim": {
                args.trim = true;
                break;
            }
            case "--verbose": {
                args.verbose = true;
                break;
            }
            default: {
                throw new Error(`Unknown argument ${arg}`);
            }
        }
    }

    if (args.config === "") {
        throw new Error("No configuration given (--config or NOC_CONFIG)");
    }

    if (args.seedOnly && args.emitSeededDir === undefined) {
        throw new Error("--seed-only requires --emit-seeded-dir");
    }

    return args;
}

/**
 * @returns the run summary, undefined when only seeding was requested
 */
export async function runFromArgs(args: RunArgs): Promise<RunSummary | undefined> {
    const config = await loadGridConfig(args.config);
    const exportOptions = { trim: args.trim };

    if (args.emitSeededDir !== undefined) {
        const seeded = await createSimulatorFromConfig(config);

        seeded.seedRoutingTables();
        await exportResults(seeded, args.emitSeededDir, exportOptions);

        if (args.seedOnly) {
            return undefined;
        }
    }

    const simulator = await createSimulatorFromConfig(config);
    const summary = simulator.run();

    await exportResults(simulator, args.outDir, exportOptions);

    return summary;
}

export async function main(argv: readonly string[], env: NodeJS.ProcessEnv): Promise<number> {
    const [command, ...rest] = argv;

    switch (command) {
        case "run": {
            const args = parseRunArgs(rest, env);

            setLogger(createConsoleLogger(args.verbose ? "debug" : "info"));

            try {
                await runFromArgs(args);
            } catch (error) {
                if (error instanceof NoCError) {
                    logger.error(error.message, NS);

                    return 1;
                }

                throw error;
            }

            return 0;
        }
        case "view": {
            const [path, selector] = rest;

            if (path === undefined || selector === undefined) {
                printViewHelp();

                return 1;
            }

            for (const line of await viewMemory(path, selector)) {
                console.log(line);
            }

            return 0;
        }
        case "decode": {
            const [hex] = rest;

            if (hex === undefined) {
                printDecodeHelp();

                return 1;
            }

            for (const line of decodeRoutingWord(hex)) {
                console.log(line);
            }

            return 0;
        }
        case "help": {
            printHelp(false);

            return 0;
        }
        default: {
            printHelp(true);

            return 1;
        }
    }
}

/* v8 ignore start -- @preserve */
if (isMainModule(import.meta.url)) {
    process.exitCode = await main(process.argv.slice(2), process.env);
}
/* v8 ignore stop -- @preserve */
