import { mkdirSync } from "node:fs";
import { createNoCMessage, type NoCMessage } from "../src/noc/message.js";
import { type PrimOp, SendMode, type SendPrimitive } from "../src/noc/primitive.js";

/** 32-byte cell holding `start, start+1, ...` (mod 256) */
export const sequentialCell = (start: number): Buffer => Buffer.from(Array.from({ length: 32 }, (_, i) => (start + i) & 0xff));

export const sendOp = (send: Partial<SendPrimitive>, messages?: Partial<NoCMessage>[]): PrimOp => ({
    kind: "send",
    send: {
        mode: SendMode.CELL,
        neuronType: 0,
        messageNum: 1,
        sendAddr: 0,
        paraAddr: 0,
        ...send,
        messages: messages?.map((message) => createNoCMessage(message)),
    },
});

export const recvOp = (recvAddr: number, tagId: number): PrimOp => ({ kind: "recv", recv: { recvAddr, tagId } });

export const stopOp = (): PrimOp => ({ kind: "stop" });

export const makeTempDir = (prefix: string): string => {
    const dir = `temp_${prefix}_${Math.floor(Math.random() * 1000000)}`;

    mkdirSync(dir, { recursive: true });

    return dir;
};
