export * from "./paths/PathHelper.js";
export * from "./errors/CliaError.js";
export * from "./errors/WireErrors.js";
export * from "./errors/errno.js";
export * from "./config/CliaConfig.js";
export * from "./history/HistoryTypes.js";
export * from "./bus/BusNames.js";
export * from "./bus/BusPayloads.js";
export * from "./concurrency/SerialQueue.js";
export * from "./concurrency/withTimeout.js";
export * from "./text/codePoints.js";
