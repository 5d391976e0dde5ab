/**
 * Pino logger factories.
 * `makeLogger` writes JSON lines to stdout; `makeRunLogger` additionally keeps a
 * per-process run log (model requests, responses, tool results) at debug level.
 * Both are silent under Vitest.
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type { Logger } from "pino";

const APP_NAME = "toolloop";

function isTestTooling(): boolean {
  return process.env["VITEST"] === "true" || process.env["NODE_ENV"] === "test";
}

export function makeLogger(
  level: LevelWithSilent = "info",
  bindings?: Record<string, unknown>,
): Logger {
  return pino(
    {
      level,
      enabled: !isTestTooling(),
      base: { ...bindings, app: APP_NAME },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 1, sync: true }),
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

export type RunLogger = {
  logger: Logger;
  file: string;
};

export function runLogFileName(startedAt: Date): string {
  // agent_run_20260102_030405.log
  const stamp = startedAt.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
  return `agent_run_${stamp}.log`;
}

/**
 * Console output at `level`, plus every debug record in a run log file under `dir`.
 */
export function makeRunLogger(
  dir: string,
  level: LevelWithSilent = "warn",
  startedAt: Date = new Date(),
): RunLogger {
  mkdirSync(dir, { recursive: true });
  const file = join(dir, runLogFileName(startedAt));

  const streams: Array<pino.StreamEntry> = [
    { level: "debug", stream: pino.destination({ dest: file, sync: true }) },
  ];
  if (level !== "silent") {
    streams.push({ level, stream: pino.destination({ dest: 1, sync: true }) });
  }

  const logger = pino(
    {
      level: "debug",
      enabled: !isTestTooling(),
      base: { app: APP_NAME },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );

  return { logger, file };
}
