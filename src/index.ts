export * from "./core/types.js";
export * from "./core/interfaces.js";
export * from "./core/errors.js";
export * from "./core/settings.js";
export * from "./core/dialects.js";
export * from "./core/hopParser.js";
export * from "./core/runAssembler.js";
export * from "./core/runStore.js";
export * from "./core/serialization.js";
export * from "./core/hostnames.js";
export * from "./core/stats.js";
export * from "./core/topology.js";

export * from "./backends/local/index.js";
