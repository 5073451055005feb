export * from "./src/exec.ts";
export { collect, forward } from "./src/helpers.ts";
