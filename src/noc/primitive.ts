import type { NoCMessage } from "./message.js";

/** Granularity of a Send */
export const enum SendMode {
    /** 8-byte units */
    CELL = "cell",
    /** 1-byte units */
    NEURON = "neuron",
}

export type SendPrimitive = {
    mode: SendMode;
    /** Reserved, the model only handles 8-bit neurons */
    neuronType: number;
    /** Number of routing table entries to use, 0 means 1. Overridden by `messages` when present */
    messageNum: number;
    /** Source cell index */
    sendAddr: number;
    /** Routing table base cell index */
    paraAddr: number;
    /** Written to the routing table at `paraAddr` right before execution */
    messages?: NoCMessage[];
};

export type RecvPrimitive = {
    /** Destination base cell index */
    recvAddr: number;
    tagId: number;
    // accepted for compatibility, relay/multicast and end markers are not modeled
    endNum?: number;
    relayMode?: number;
    mcY?: number;
    mcX?: number;
};

export type PrimOp = { kind: "send"; send: SendPrimitive } | { kind: "recv"; recv: RecvPrimitive } | { kind: "stop" };

export type CoreConfig = {
    initMemPath?: string;
    primQueue: PrimOp[];
};

/**
 * Effective number of routing table entries a Send walks.
 */
export function getMessageCount(send: SendPrimitive): number {
    if (send.messages !== undefined && send.messages.length > 0) {
        return send.messages.length;
    }

    return send.messageNum === 0 ? 1 : send.messageNum;
}

export function describePrimOp(op: PrimOp): string {
    switch (op.kind) {
        case "send": {
            return `Send(${op.send.mode}, messages=${getMessageCount(op.send)}, send_addr=${op.send.sendAddr}, para_addr=${op.send.paraAddr})`;
        }
        case "recv": {
            return `Recv(recv_addr=${op.recv.recvAddr}, tag=${op.recv.tagId})`;
        }
        case "stop": {
            return "Stop";
        }
    }
}
