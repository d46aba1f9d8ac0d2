export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

/**
 * 每筆 log 可攜帶的上下文。
 * `emoji`、`event`、`error` 為保留欄位，其餘欄位會以 JSON 附加在訊息後方。
 */
export type LogContext = {
  emoji?: string;
  event?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type LogTemplate = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: Date;
  level: LogLevel;
  path: string[];
  event: string;
  msg: string;
  context: Record<string, unknown>;
  err?: SerializedError;
};

export interface LogTransport {
  write(record: LogRecord): void;
  close(): Promise<void>;
}

export interface Logger {
  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(context?: LogContext): LogTemplate;

  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(context?: LogContext): LogTemplate;

  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(context?: LogContext): LogTemplate;

  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(context?: LogContext): LogTemplate;

  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(context?: LogContext): LogTemplate;

  /** 產生子 logger，namespace 會串接在路徑後方 */
  extend(namespace: string, context?: LogContext): Logger;

  /** 產生合併上下文的 logger，路徑不變 */
  append(context: LogContext): Logger;
}
