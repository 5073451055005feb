export * from "./src/types.ts";
export * from "./src/errors.ts";
export * from "./src/aggregate.ts";
export * from "./src/capability.ts";
export * from "./src/catalog.ts";
export * from "./src/config.ts";
export * from "./src/logger.ts";
export * from "./src/materialize.ts";
export * from "./src/report.ts";
export * from "./src/run.ts";
export * from "./src/runner.ts";
export * from "./src/select.ts";
export * from "./src/tap.ts";
