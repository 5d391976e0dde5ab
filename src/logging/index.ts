export type { Logger, RunLogger } from "./logger.js";
export { makeLogger, makeNoopLogger, makeRunLogger, runLogFileName } from "./logger.js";
