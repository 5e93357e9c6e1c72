import { NoCError, NoCErrorCode } from "../noc/errors.js";
import { MemoryConsts, MemoryImage } from "../noc/memory.js";
import type { PrimOp } from "../noc/primitive.js";
import { logger } from "../utils/logger.js";
import { type CoreCoord, CoreNode, type Delivery } from "./core-node.js";

const NS = "noc-simulator";

/**
 * How message `y`/`x` designate the destination core.
 * - relative: signed deltas from the sending core
 * - absolute: grid coordinates
 */
export type CoordinateMode = "relative" | "absolute";

export type NoCSimulatorOptions = {
    height: number;
    width: number;
    /** Defaults to relative */
    coordinates?: CoordinateMode;
    /** Wrap out-of-grid destinations around the grid edges (torus) instead of failing with NoSuchCore */
    wrap?: boolean;
    /** Memory capacity of each core, in cells */
    memoryCells?: number;
};

export type NoCCoreSetup = {
    y: number;
    x: number;
    primQueue: PrimOp[];
    /** Initial memory content */
    image?: Iterable<[cell: number, data: Buffer]>;
};

export type RunSummary = {
    rounds: number;
    primitives: number;
    /** Payload units routed */
    deliveries: number;
    /** Payload units that had to wait for a Recv */
    buffered: number;
    /** Payload units still waiting when the run ended */
    undelivered: number;
};

/**
 * Round-synchronous driver of the whole grid.
 *
 * Round `r` visits cores row-major and lets each core with a primitive left execute exactly one,
 * deliveries included, before visiting the next. That visiting order is the only ordering authority:
 * it decides whether a handshake Send finds its Recv already executed or gets buffered.
 */
export class NoCSimulator {
    readonly height: number;
    readonly width: number;
    readonly coordinates: CoordinateMode;
    readonly wrap: boolean;

    /** Row-major */
    readonly #nodes: CoreNode[];

    #round = 0;
    #primitives = 0;
    #deliveries = 0;
    #buffered = 0;

    constructor(options: NoCSimulatorOptions, cores: readonly NoCCoreSetup[] = []) {
        const { height, width } = options;

        if (!Number.isInteger(height) || height <= 0 || !Number.isInteger(width) || width <= 0) {
            throw new NoCError(NoCErrorCode.INVALID_CONFIG, `Invalid grid shape ${height}x${width}`);
        }

        this.height = height;
        this.width = width;
        this.coordinates = options.coordinates ?? "relative";
        this.wrap = options.wrap ?? false;

        const setups = new Map<number, NoCCoreSetup>();

        for (const setup of cores) {
            if (!this.#inGrid(setup.y, setup.x)) {
                throw new NoCError(NoCErrorCode.INVALID_CONFIG, `Core (${setup.y},${setup.x}) outside ${height}x${width} grid`);
            }

            const index = setup.y * width + setup.x;

            if (setups.has(index)) {
                throw new NoCError(NoCErrorCode.INVALID_CONFIG, `Core (${setup.y},${setup.x}) configured more than once`);
            }

            setups.set(index, setup);
        }

        const callbacks = {
            onDeliver: (delivery: Delivery): void => this.deliver(delivery),
        };

        this.#nodes = [];

        for (let y = 0; y < height; y++) {
            for (let x = 0; x < width; x++) {
                const setup = setups.get(y * width + x);
                const memory = new MemoryImage(options.memoryCells ?? MemoryConsts.DEFAULT_CAPACITY);

                if (setup?.image !== undefined) {
                    memory.load(setup.image);
                }

                this.#nodes.push(new CoreNode(y, x, memory, setup?.primQueue ?? [], callbacks));
            }
        }
    }

    /** Number of rounds executed so far */
    get round(): number {
        return this.#round;
    }

    public getCore(y: number, x: number): CoreNode {
        if (!this.#inGrid(y, x)) {
            throw new NoCError(NoCErrorCode.NO_SUCH_CORE, `No core at (${y},${x}) in ${this.height}x${this.width} grid`);
        }

        return this.#nodes[y * this.width + x];
    }

    /**
     * All cores, row-major.
     */
    public cores(): readonly CoreNode[] {
        return this.#nodes;
    }

    public isDone(): boolean {
        return this.#nodes.every((node) => !node.hasNext());
    }

    /**
     * Write every inline Send message into its core's routing table, without executing anything.
     */
    public seedRoutingTables(): void {
        for (const node of this.#nodes) {
            node.seedRoutingTable();
        }
    }

    /**
     * Execute one round.
     * @returns false when there was nothing left to execute
     */
    public step(): boolean {
        if (this.isDone()) {
            return false;
        }

        const round = this.#round;

        for (const node of this.#nodes) {
            if (!node.hasNext()) {
                continue;
            }

            const primIndex = node.cursor;

            try {
                node.executeNext();
            } catch (error) {
                if (error instanceof NoCError) {
                    throw error.withContext({ core: node.coord, round, primIndex });
                }

                throw error;
            }

            this.#primitives += 1;
        }

        this.#round += 1;

        return true;
    }

    /**
     * Run rounds until every queue is exhausted. Aborts on the first failure.
     */
    public run(): RunSummary {
        logger.info(() => `Running ${this.height}x${this.width} grid (${this.coordinates} coordinates${this.wrap ? ", wrapping" : ""})`, NS);

        while (!this.isDone()) {
            this.step();
        }

        const summary = this.getSummary();

        for (const node of this.#nodes) {
            const pending = node.getPendingCount();

            if (pending > 0) {
                logger.warning(
                    () => `Core (${node.y},${node.x}) ended with ${pending} undelivered unit(s) for tag(s) ${node.getPendingTags().join(",")}`,
                    NS,
                );
            }
        }

        logger.info(
            () =>
                `Done after ${summary.rounds} round(s): ${summary.primitives} primitive(s), ${summary.deliveries} unit(s) routed, ` +
                `${summary.buffered} buffered, ${summary.undelivered} undelivered`,
            NS,
        );

        return summary;
    }

    public getSummary(): RunSummary {
        let undelivered = 0;

        for (const node of this.#nodes) {
            undelivered += node.getPendingCount();
        }

        return {
            rounds: this.#round,
            primitives: this.#primitives,
            deliveries: this.#deliveries,
            buffered: this.#buffered,
            undelivered,
        };
    }

    /**
     * Route one payload unit to its destination core, writing or buffering it there immediately.
     */
    public deliver(delivery: Delivery): void {
        const [y, x] = this.resolveDestination(delivery.source, delivery.y, delivery.x);
        const outcome = this.#nodes[y * this.width + x].accept(delivery);

        this.#deliveries += 1;

        if (outcome === "buffered") {
            this.#buffered += 1;
        }
    }

    /**
     * Grid coordinates designated by a message's `y`/`x` when sent from `source`.
     */
    public resolveDestination(source: CoreCoord, y: number, x: number): CoreCoord {
        let targetY = this.coordinates === "relative" ? source[0] + y : y;
        let targetX = this.coordinates === "relative" ? source[1] + x : x;

        if (this.wrap) {
            targetY = ((targetY % this.height) + this.height) % this.height;
            targetX = ((targetX % this.width) + this.width) % this.width;
        }

        if (!this.#inGrid(targetY, targetX)) {
            throw new NoCError(
                NoCErrorCode.NO_SUCH_CORE,
                `Destination (${targetY},${targetX}) from (${source[0]},${source[1]}) outside ${this.height}x${this.width} grid`,
            );
        }

        return [targetY, targetX];
    }

    #inGrid(y: number, x: number): boolean {
        return Number.isInteger(y) && Number.isInteger(x) && y >= 0 && y < this.height && x >= 0 && x < this.width;
    }
}
