export * from "./types.js";
export * from "./errors.js";
export * from "./utils.js";
export * from "./logger.js";
export * from "./poll.js";
export * from "./ledger.js";
export * from "./cursor.js";
export * from "./model.js";
export * from "./state-machine.js";
export * from "./session.js";
export * from "./timeline.js";
export * from "./run.js";
export * from "./collaborators.js";
export * from "./consumer.js";
export * from "./provider.js";
export * from "./contract.js";
export * from "./memory.js";
