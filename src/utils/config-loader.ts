import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import yaml from "js-yaml";
import { NoCError, NoCErrorCode } from "../noc/errors.js";
import { MemoryConsts } from "../noc/memory.js";
import { createNoCMessage, type NoCMessage } from "../noc/message.js";
import { type CoreConfig, type PrimOp, type RecvPrimitive, SendMode, type SendPrimitive } from "../noc/primitive.js";
import { type CoordinateMode, type NoCCoreSetup, NoCSimulator } from "../simulator/noc-simulator.js";
import { logger } from "./logger.js";
import { readMemoryImageFile } from "./memory-image-format.js";

const NS = "config-loader";

export type NoCCoreConfig = {
    y: number;
    x: number;
    config: CoreConfig;
};

export type NoCGridConfig = {
    height: number;
    width: number;
    coordinates: CoordinateMode;
    wrap: boolean;
    memoryCells: number;
    cores: NoCCoreConfig[];
};

type RawObject = Record<string, unknown>;

function isRawObject(value: unknown): value is RawObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(path: string, reason: string): NoCError {
    return new NoCError(NoCErrorCode.INVALID_CONFIG, `${path}: ${reason}`);
}

function expectObject(value: unknown, path: string): RawObject {
    if (!isRawObject(value)) {
        throw invalid(path, "expected an object");
    }

    return value;
}

function expectArray(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) {
        throw invalid(path, "expected an array");
    }

    return value;
}

function readInt(obj: RawObject, key: string, path: string, fallback?: number): number {
    const value = obj[key];

    if (value === undefined) {
        if (fallback === undefined) {
            throw invalid(`${path}.${key}`, "required");
        }

        return fallback;
    }

    if (typeof value !== "number" || !Number.isInteger(value)) {
        throw invalid(`${path}.${key}`, `expected an integer, got ${JSON.stringify(value)}`);
    }

    return value;
}

function readOptionalInt(obj: RawObject, key: string, path: string): number | undefined {
    return obj[key] === undefined ? undefined : readInt(obj, key, path);
}

/**
 * Flags are accepted as booleans or 0/1, as hardware-oriented configs tend to write them.
 */
function readFlag(obj: RawObject, key: string, path: string, fallback: boolean): boolean {
    const value = obj[key];

    if (value === undefined) {
        return fallback;
    }

    if (typeof value === "boolean") {
        return value;
    }

    if (value === 0 || value === 1) {
        return value === 1;
    }

    throw invalid(`${path}.${key}`, `expected a boolean or 0/1, got ${JSON.stringify(value)}`);
}

function readOptionalString(obj: RawObject, key: string, path: string): string | undefined {
    const value = obj[key];

    if (value === undefined || value === null) {
        return undefined;
    }

    if (typeof value !== "string") {
        throw invalid(`${path}.${key}`, "expected a string");
    }

    return value;
}

function readReserved(obj: RawObject, path: string): bigint {
    const value = obj.reserved;

    if (value === undefined) {
        return 0n;
    }

    if (typeof value === "number" && Number.isInteger(value)) {
        return BigInt(value);
    }

    if (typeof value === "string" && /^(0x[0-9a-fA-F]+|[0-9]+)$/.test(value)) {
        return BigInt(value);
    }

    throw invalid(`${path}.reserved`, "expected an integer or an integer string");
}

/**
 * Message fields use their snake_case names (`sparse` also sets `s`); omitted ones take the defaults of `createNoCMessage`.
 * Ranges are not checked here, an out-of-range value fails with InvalidField when its Send executes.
 */
export function parseMessageConfig(raw: unknown, path: string): NoCMessage {
    const obj = expectObject(raw, path);
    const defaults = createNoCMessage();

    return {
        s: readFlag(obj, "s", path, readFlag(obj, "sparse", path, defaults.s)),
        t: readFlag(obj, "t", path, defaults.t),
        e: readFlag(obj, "e", path, defaults.e),
        q: readFlag(obj, "q", path, defaults.q),
        lvds: readInt(obj, "lvds", path, defaults.lvds),
        y: readInt(obj, "y", path, defaults.y),
        x: readInt(obj, "x", path, defaults.x),
        a0: readInt(obj, "a0", path, defaults.a0),
        cnt: readInt(obj, "cnt", path, defaults.cnt),
        aOffset: readInt(obj, "a_offset", path, defaults.aOffset),
        constRaw: readInt(obj, "const_raw", path, defaults.constRaw),
        handshake: readFlag(obj, "handshake", path, defaults.handshake),
        tagId: readInt(obj, "tag_id", path, defaults.tagId),
        en: readFlag(obj, "en", path, defaults.en),
        reserved: readReserved(obj, path),
    };
}

function readSendMode(obj: RawObject, path: string): SendMode {
    const mode = obj.mode;

    if (mode !== undefined) {
        if (mode === SendMode.CELL || mode === SendMode.NEURON) {
            return mode;
        }

        throw invalid(`${path}.mode`, `expected "${SendMode.CELL}" or "${SendMode.NEURON}"`);
    }

    const cellOrNeuron = readInt(obj, "cell_or_neuron", path, 0);

    if (cellOrNeuron !== 0 && cellOrNeuron !== 1) {
        throw invalid(`${path}.cell_or_neuron`, "expected 0 (cell) or 1 (neuron)");
    }

    return cellOrNeuron === 0 ? SendMode.CELL : SendMode.NEURON;
}

export function parseSendConfig(raw: unknown, path: string): SendPrimitive {
    const obj = expectObject(raw, path);
    const send: SendPrimitive = {
        mode: readSendMode(obj, path),
        neuronType: readInt(obj, "neuron_type", path, 0),
        messageNum: readInt(obj, "message_num", path, 1),
        sendAddr: readInt(obj, "send_addr", path, 0),
        paraAddr: readInt(obj, "para_addr", path, 0),
    };

    if (obj.messages !== undefined) {
        send.messages = expectArray(obj.messages, `${path}.messages`).map((message, i) => parseMessageConfig(message, `${path}.messages[${i}]`));
    }

    return send;
}

export function parseRecvConfig(raw: unknown, path: string): RecvPrimitive {
    const obj = expectObject(raw, path);

    return {
        recvAddr: readInt(obj, "recv_addr", path),
        tagId: readInt(obj, "tag_id", path),
        endNum: readOptionalInt(obj, "end_num", path),
        relayMode: readOptionalInt(obj, "relay_mode", path),
        mcY: readOptionalInt(obj, "mc_y", path),
        mcX: readOptionalInt(obj, "mc_x", path),
    };
}

export function parsePrimConfig(raw: unknown, path: string): PrimOp {
    const obj = expectObject(raw, path);
    const kind = obj.kind;

    if (kind === "stop" || obj.stop === true) {
        return { kind: "stop" };
    }

    if (kind !== undefined && kind !== "send" && kind !== "recv") {
        throw invalid(`${path}.kind`, `unknown primitive kind ${JSON.stringify(kind)}`);
    }

    const hasSend = obj.send !== undefined;
    const hasRecv = obj.recv !== undefined;

    if (hasSend && hasRecv) {
        throw invalid(path, "one primitive cannot carry both 'send' and 'recv'");
    }

    if (kind === "send" || (kind === undefined && hasSend)) {
        return { kind: "send", send: parseSendConfig(obj.send, `${path}.send`) };
    }

    if (kind === "recv" || (kind === undefined && hasRecv)) {
        return { kind: "recv", recv: parseRecvConfig(obj.recv, `${path}.recv`) };
    }

    throw invalid(path, "primitive must specify 'send', 'recv' or 'stop'");
}

/**
 * @param baseDir Directory relative `init_mem_path` values resolve against
 */
export function parseCoreConfig(raw: unknown, path: string, baseDir: string): CoreConfig {
    const obj = expectObject(raw, path);
    const initMemPath = readOptionalString(obj, "init_mem_path", path);
    const hasLegacy = obj.send_queue !== undefined || obj.recv_queue !== undefined;
    let primQueue: PrimOp[];

    if (obj.prim_queue !== undefined) {
        if (hasLegacy) {
            logger.warning(`${path}: send_queue/recv_queue are ignored when prim_queue is present`, NS);
        }

        primQueue = expectArray(obj.prim_queue, `${path}.prim_queue`).map((prim, i) => parsePrimConfig(prim, `${path}.prim_queue[${i}]`));
    } else if (hasLegacy) {
        logger.warning(`${path}: send_queue/recv_queue are deprecated, converted to prim_queue (all sends, then all recvs)`, NS);

        const sends = expectArray(obj.send_queue ?? [], `${path}.send_queue`).map(
            (send, i): PrimOp => ({ kind: "send", send: parseSendConfig(send, `${path}.send_queue[${i}]`) }),
        );
        const recvs = expectArray(obj.recv_queue ?? [], `${path}.recv_queue`).map(
            (recv, i): PrimOp => ({ kind: "recv", recv: parseRecvConfig(recv, `${path}.recv_queue[${i}]`) }),
        );

        primQueue = [...sends, ...recvs];
    } else {
        primQueue = [];
    }

    return {
        initMemPath: initMemPath === undefined || isAbsolute(initMemPath) ? initMemPath : resolve(baseDir, initMemPath),
        primQueue,
    };
}

function readCoordinateMode(value: unknown): CoordinateMode {
    if (value === undefined) {
        return "relative";
    }

    if (value === "relative" || value === "absolute") {
        return value;
    }

    throw invalid("config.coordinates", 'expected "relative" or "absolute"');
}

export function parseGridConfig(raw: unknown, baseDir: string): NoCGridConfig {
    const obj = expectObject(raw, "config");
    const height = readInt(obj, "height", "config");
    const width = readInt(obj, "width", "config");

    if (height <= 0 || width <= 0) {
        throw invalid("config", `invalid grid shape ${height}x${width}`);
    }

    const memoryCells = readInt(obj, "memory_cells", "config", MemoryConsts.DEFAULT_CAPACITY);

    if (memoryCells <= 0) {
        throw invalid("config.memory_cells", "expected a positive integer");
    }

    const seen = new Set<string>();
    const cores = expectArray(obj.cores ?? [], "config.cores").map((rawCore, i): NoCCoreConfig => {
        const path = `config.cores[${i}]`;
        const core = expectObject(rawCore, path);
        const y = readInt(core, "y", path);
        const x = readInt(core, "x", path);

        if (y < 0 || y >= height || x < 0 || x >= width) {
            throw invalid(path, `core (${y},${x}) outside ${height}x${width} grid`);
        }

        const key = `${y},${x}`;

        if (seen.has(key)) {
            throw invalid(path, `core (${key}) configured more than once`);
        }

        seen.add(key);

        return { y, x, config: parseCoreConfig(core.config ?? {}, `${path}.config`, baseDir) };
    });

    return {
        height,
        width,
        coordinates: readCoordinateMode(obj.coordinates),
        wrap: readFlag(obj, "wrap", "config", false),
        memoryCells,
        cores,
    };
}

/**
 * Load a JSON or YAML configuration file (JSON being valid YAML, one parser handles both).
 */
export async function loadGridConfig(path: string): Promise<NoCGridConfig> {
    const text = await readFile(path, "utf8");
    let raw: unknown;

    try {
        raw = yaml.load(text, { filename: path });
    } catch (error) {
        throw new NoCError(NoCErrorCode.INVALID_CONFIG, `${path}: ${error instanceof Error ? error.message : String(error)}`, {}, { cause: error });
    }

    logger.debug(() => `Loaded configuration ${path}`, NS);

    return parseGridConfig(raw, dirname(resolve(path)));
}

/**
 * Build a simulator from a configuration, loading the initial memory images it references.
 */
export async function createSimulatorFromConfig(config: NoCGridConfig): Promise<NoCSimulator> {
    const setups: NoCCoreSetup[] = [];

    for (const core of config.cores) {
        setups.push({
            y: core.y,
            x: core.x,
            primQueue: core.config.primQueue,
            image: core.config.initMemPath === undefined ? undefined : await readMemoryImageFile(core.config.initMemPath, config.memoryCells),
        });
    }

    return new NoCSimulator(
        {
            height: config.height,
            width: config.width,
            coordinates: config.coordinates,
            wrap: config.wrap,
            memoryCells: config.memoryCells,
        },
        setups,
    );
}
