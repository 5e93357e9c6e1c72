export { generateAddresses, getUnitBytes, mapAddress, normalizeCount, SourceCursor } from "./noc/address.js";
export { assertFieldRange, NoCError, NoCErrorCode, type NoCErrorContext } from "./noc/errors.js";
export { MemoryConsts, MemoryImage } from "./noc/memory.js";
export {
    createDisabledNoCMessage,
    createNoCMessage,
    decodeNoCMessage,
    encodeNoCMessage,
    getGroupSize,
    type NoCMessage,
    NoCMessageConsts,
    packRoutingRow,
    unpackRoutingRow,
} from "./noc/message.js";
export {
    type CoreConfig,
    describePrimOp,
    getMessageCount,
    type PrimOp,
    type RecvPrimitive,
    SendMode,
    type SendPrimitive,
} from "./noc/primitive.js";
export { RoutingTable } from "./noc/routing-table.js";
export { type CoreCoord, CoreNode, type CoreNodeCallbacks, type Delivery, type DeliveryOutcome } from "./simulator/core-node.js";
export {
    type CoordinateMode,
    type NoCCoreSetup,
    NoCSimulator,
    type NoCSimulatorOptions,
    type RunSummary,
} from "./simulator/noc-simulator.js";
export {
    createSimulatorFromConfig,
    loadGridConfig,
    type NoCCoreConfig,
    type NoCGridConfig,
    parseGridConfig,
} from "./utils/config-loader.js";
export { createConsoleLogger, type Logger, type LogLevel, logger, setLogger } from "./utils/logger.js";
export {
    formatMemoryLine,
    type MemoryImageCells,
    parseMemoryImage,
    readMemoryImageFile,
    serializeMemoryImage,
    writeMemoryImageFile,
} from "./utils/memory-image-format.js";
export { type ExportOptions, exportResults, getDumpFileName } from "./utils/result-export.js";
