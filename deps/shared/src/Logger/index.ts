import { Type as t } from "@sinclair/typebox";
import path from "node:path";

import { type EnvSource, buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { LoggerConsole, defaultEmojiMap } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export {
  LoggerConsole,
  defaultEmojiMap,
  serializeError,
} from "./LoggerConsole";

const loggerConfigSchema = t.Object({
  LOG_LEVEL: t.Optional(
    t.Union([
      t.Literal("trace"),
      t.Literal("debug"),
      t.Literal("info"),
      t.Literal("warn"),
      t.Literal("error"),
    ])
  ),
  /** 額外以 JSON lines 寫入的 log 檔路徑 */
  LOG_FILE: t.Optional(t.String()),
});

export function createDefaultLoggerFromEnv(env?: EnvSource) {
  const config = buildConfigFactoryEnv(loggerConfigSchema, env)();
  const logger = new LoggerConsole(
    config.LOG_LEVEL ?? "info",
    [],
    {},
    defaultEmojiMap
  );
  if (config.LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({
        filename: path.basename(config.LOG_FILE),
        rfs: { path: path.dirname(config.LOG_FILE) },
      })
    );
  }
  return logger;
}
