// @wristcheck/fault-kernel
// Entry point exports for the device fault detection core.

export * from "./errors";
export * from "./types";
export * from "./kernel";
export * from "./align/aligner";
export * from "./segment/segmenter";
export * from "./stats/rolling";
export * from "./rules/worn_rules";
export * from "./rules/unworn_rules";
export * from "./verdict/aggregator";
