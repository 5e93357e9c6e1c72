/**
 * Failure codes of a simulation run. Every one of them is terminal: the run aborts on the first.
 */
export enum NoCErrorCode {
    /** Message or primitive field outside its declared bit width */
    INVALID_FIELD = "InvalidField",
    /** Send target coordinates outside the grid */
    NO_SUCH_CORE = "NoSuchCore",
    /** Non-handshake delivery to a tag no Recv has registered at the destination */
    UNRESOLVED_TAG = "UnresolvedTag",
    /** Core stepped with nothing left in its queue */
    QUEUE_EMPTY = "QueueEmpty",
    /** Cell index outside the memory image capacity */
    ADDRESS_OUT_OF_RANGE = "AddressOutOfRange",
    /** Unparseable memory image line */
    MALFORMED_IMAGE = "MalformedImage",
    /** Configuration that cannot be turned into a grid */
    INVALID_CONFIG = "InvalidConfig",
}

/**
 * Where in the run a failure happened. Filled in by the simulator when it aborts.
 */
export type NoCErrorContext = {
    core?: [y: number, x: number];
    round?: number;
    primIndex?: number;
};

export class NoCError extends Error {
    public readonly code: NoCErrorCode;
    public readonly core?: [y: number, x: number];
    public readonly round?: number;
    public readonly primIndex?: number;

    constructor(code: NoCErrorCode, message: string, context: NoCErrorContext = {}, options?: ErrorOptions) {
        super(message, options);

        this.name = "NoCError";
        this.code = code;
        this.core = context.core;
        this.round = context.round;
        this.primIndex = context.primIndex;
    }

    /**
     * Copy of this error located at the given point of the run. The original is kept as `cause`.
     */
    public withContext(context: NoCErrorContext): NoCError {
        const where: string[] = [];

        if (context.core !== undefined) {
            where.push(`core (${context.core[0]},${context.core[1]})`);
        }

        if (context.round !== undefined) {
            where.push(`round ${context.round}`);
        }

        if (context.primIndex !== undefined) {
            where.push(`primitive #${context.primIndex}`);
        }

        return new NoCError(this.code, `${this.code} at ${where.join(", ")}: ${this.message}`, context, { cause: this });
    }
}

/**
 * Throw `InvalidField` unless `value` is an integer within `[min, max]`.
 */
export function assertFieldRange(name: string, value: number, min: number, max: number): void {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new NoCError(NoCErrorCode.INVALID_FIELD, `Field ${name}=${value} out of range [${min}..${max}]`);
    }
}
