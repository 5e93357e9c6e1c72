import { generateAddresses, getUnitBytes, mapAddress, normalizeCount, SourceCursor } from "../noc/address.js";
import { assertFieldRange, NoCError, NoCErrorCode } from "../noc/errors.js";
import { type MemoryImage, MemoryConsts } from "../noc/memory.js";
import { describePrimOp, getMessageCount, type PrimOp, type RecvPrimitive, SendMode, type SendPrimitive } from "../noc/primitive.js";
import { RoutingTable } from "../noc/routing-table.js";
import { logger } from "../utils/logger.js";

const NS = "core-node";

/** Cell addresses carried by primitives are 16 bits */
const PRIM_ADDR_MAX = 0xffff;
const TAG_ID_MAX = 0xff;
const MESSAGE_NUM_MAX = 0xff;

export type CoreCoord = [y: number, x: number];

/**
 * One unit of Send payload on its way to a destination core.
 */
export type Delivery = {
    source: CoreCoord;
    /** Destination row, as found in the message (interpretation belongs to the simulator) */
    y: number;
    /** Destination column, as found in the message */
    x: number;
    tagId: number;
    handshake: boolean;
    mode: SendMode;
    /** Destination address unit (A), relative to the receive window base */
    address: number;
    /** 8 bytes in cell mode, 1 byte in neuron mode */
    payload: Buffer;
};

export type DeliveryOutcome = "written" | "buffered";

type PendingEntry = {
    mode: SendMode;
    address: number;
    payload: Buffer;
};

/**
 * Callbacks from a core to the simulator driving it
 */
export interface CoreNodeCallbacks {
    /** Route one payload unit produced by a Send. Synchronous: the destination is updated before it returns. */
    onDeliver: (delivery: Delivery) => void;
}

/**
 * One core of the grid: its memory, its primitive program and its handshake state.
 *
 * Receive windows map a tag to the `recvAddr` of the latest Recv executed here for it.
 * Deliveries for a tag without a window are buffered (handshake) or rejected (non-handshake).
 */
export class CoreNode {
    readonly y: number;
    readonly x: number;
    readonly memory: MemoryImage;
    readonly routingTable: RoutingTable;

    readonly #callbacks: CoreNodeCallbacks;
    readonly #queue: PrimOp[];
    readonly #queueLength: number;
    #cursor = 0;
    #stopped = false;

    /** Handshake payload awaiting a Recv, by tag, in arrival order */
    readonly #pendingByTag = new Map<number, PendingEntry[]>();
    /** Open receive windows: tag => recvAddr */
    readonly #recvWindows = new Map<number, number>();

    constructor(y: number, x: number, memory: MemoryImage, primQueue: readonly PrimOp[], callbacks: CoreNodeCallbacks) {
        this.y = y;
        this.x = x;
        this.memory = memory;
        this.routingTable = new RoutingTable(memory);
        this.#callbacks = callbacks;
        this.#queue = primQueue.slice();
        this.#queueLength = primQueue.length;
    }

    // #region Getters

    get coord(): CoreCoord {
        return [this.y, this.x];
    }

    /** Index of the next primitive to execute in the original program */
    get cursor(): number {
        return this.#cursor;
    }

    get queueLength(): number {
        return this.#queueLength;
    }

    get stopped(): boolean {
        return this.#stopped;
    }

    // #endregion

    public hasNext(): boolean {
        return this.#queue.length > 0;
    }

    public peek(): PrimOp | undefined {
        return this.#queue[0];
    }

    /**
     * Number of buffered entries, for one tag or all of them.
     */
    public getPendingCount(tagId?: number): number {
        if (tagId !== undefined) {
            return this.#pendingByTag.get(tagId)?.length ?? 0;
        }

        let count = 0;

        for (const entries of this.#pendingByTag.values()) {
            count += entries.length;
        }

        return count;
    }

    public getPendingTags(): number[] {
        return Array.from(this.#pendingByTag.keys()).sort((a, b) => a - b);
    }

    public getRecvWindow(tagId: number): number | undefined {
        return this.#recvWindows.get(tagId);
    }

    /**
     * Write the inline messages of every queued Send into the routing table, without executing anything.
     */
    public seedRoutingTable(): void {
        for (const op of this.#queue) {
            if (op.kind === "send" && op.send.messages !== undefined && op.send.messages.length > 0) {
                this.routingTable.writeMessages(op.send.paraAddr, op.send.messages);
            }
        }
    }

    /**
     * Consume and execute the head of the queue, including every delivery it produces.
     * @returns the executed primitive
     */
    public executeNext(): PrimOp {
        const op = this.#queue.shift();

        if (op === undefined) {
            throw new NoCError(NoCErrorCode.QUEUE_EMPTY, `Core (${this.y},${this.x}) has no primitive left`);
        }

        logger.debug(() => `(${this.y},${this.x}) #${this.#cursor} ${describePrimOp(op)}`, NS);

        this.#cursor += 1;

        switch (op.kind) {
            case "send": {
                this.#executeSend(op.send);
                break;
            }
            case "recv": {
                this.#executeRecv(op.recv);
                break;
            }
            case "stop": {
                this.#cursor += this.#queue.length;
                this.#queue.length = 0;
                this.#stopped = true;

                logger.debug(() => `(${this.y},${this.x}) stopped`, NS);
                break;
            }
        }

        return op;
    }

    /**
     * Take one payload unit addressed to this core.
     */
    public accept(delivery: Delivery): DeliveryOutcome {
        const recvAddr = this.#recvWindows.get(delivery.tagId);

        if (recvAddr !== undefined) {
            this.#write(recvAddr, delivery);

            return "written";
        }

        if (!delivery.handshake) {
            throw new NoCError(
                NoCErrorCode.UNRESOLVED_TAG,
                `Core (${this.y},${this.x}) has no Recv registered for tag ${delivery.tagId} (from (${delivery.source[0]},${delivery.source[1]}))`,
            );
        }

        let entries = this.#pendingByTag.get(delivery.tagId);

        if (entries === undefined) {
            entries = [];

            this.#pendingByTag.set(delivery.tagId, entries);
        }

        entries.push({ mode: delivery.mode, address: delivery.address, payload: delivery.payload });

        return "buffered";
    }

    #executeSend(send: SendPrimitive): void {
        assertFieldRange("send_addr", send.sendAddr, 0, PRIM_ADDR_MAX);
        assertFieldRange("para_addr", send.paraAddr, 0, PRIM_ADDR_MAX);
        assertFieldRange("message_num", send.messageNum, 0, MESSAGE_NUM_MAX);

        const messageCount = getMessageCount(send);

        // inline messages override message_num
        assertFieldRange("message_num", messageCount, 1, MESSAGE_NUM_MAX);

        if (send.messages !== undefined && send.messages.length > 0) {
            this.routingTable.writeMessages(send.paraAddr, send.messages);
        }

        const unitBytes = getUnitBytes(send.mode);
        const source = new SourceCursor(send.mode, send.sendAddr);
        // whole table read before delivering: deliveries to this core may overwrite its own rows
        const messages = this.routingTable.readMessages(send.paraAddr, messageCount);

        for (let i = 0; i < messages.length; i++) {
            const message = messages[i];

            if (!message.en) {
                logger.debug(() => `(${this.y},${this.x}) message ${i} disabled, skipping`, NS);
                source.skip(normalizeCount(message.cnt));
                continue;
            }

            for (const address of generateAddresses(message.a0, message.cnt, message.aOffset, message.constRaw)) {
                const [cell, offset] = source.next();

                this.#callbacks.onDeliver({
                    source: this.coord,
                    y: message.y,
                    x: message.x,
                    tagId: message.tagId,
                    handshake: message.handshake,
                    mode: send.mode,
                    address,
                    payload: this.memory.readBytes(cell, offset, unitBytes),
                });
            }
        }
    }

    #executeRecv(recv: RecvPrimitive): void {
        assertFieldRange("recv_addr", recv.recvAddr, 0, PRIM_ADDR_MAX);
        assertFieldRange("tag_id", recv.tagId, 0, TAG_ID_MAX);

        this.#recvWindows.set(recv.tagId, recv.recvAddr);

        const entries = this.#pendingByTag.get(recv.tagId);

        if (entries === undefined) {
            return;
        }

        this.#pendingByTag.delete(recv.tagId);

        logger.debug(() => `(${this.y},${this.x}) draining ${entries.length} buffered unit(s) for tag ${recv.tagId}`, NS);

        for (const entry of entries) {
            this.#write(recv.recvAddr, entry);
        }
    }

    #write(recvAddr: number, unit: PendingEntry): void {
        const [cell, offset] = mapAddress(unit.mode, recvAddr, unit.address);

        if (unit.mode === SendMode.CELL) {
            this.memory.write8(cell, offset / MemoryConsts.SEGMENT_BYTES, unit.payload);
        } else {
            this.memory.write1(cell, offset, unit.payload.readUInt8(0));
        }
    }
}
