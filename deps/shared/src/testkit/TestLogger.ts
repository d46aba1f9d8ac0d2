import { type LogLevel, LoggerConsole } from "~shared/Logger";

/** 測試用 logger，預設只輸出 error 以免干擾測試輸出 */
export function buildTestLogger(level: LogLevel = "error") {
  return new LoggerConsole(level, ["test"], {}, {});
}
