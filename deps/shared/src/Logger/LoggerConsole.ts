import { format } from "date-fns";
import kleur from "kleur";

import type {
  LogContext,
  LogLevel,
  LogRecord,
  LogTemplate,
  LogTransport,
  Logger,
  SerializedError,
} from "./Logger";

const levelOrder: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

export const defaultEmojiMap: Record<string, string> = {
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const levelColor: Record<LogLevel, (s: string) => string> = {
  trace: kleur.gray,
  debug: kleur.magenta,
  info: kleur.cyan,
  warn: kleur.yellow,
  error: kleur.red,
};

const consoleOf: Record<LogLevel, (...args: unknown[]) => void> = {
  trace: (...args) => console.debug(...args),
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (typeof error === "object" && error !== null) {
    const message =
      "message" in error && typeof error.message === "string"
        ? error.message
        : safeStringify(error);
    const name =
      "type" in error && typeof error.type === "string" ? error.type : "Error";
    return { name, message };
  }
  return { name: "Error", message: String(error) };
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch (e) {
    return `[unserializable: ${e instanceof Error ? e.message : String(e)}]`;
  }
}

function withoutReserved(context: LogContext): Record<string, unknown> {
  const rest: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (key === "emoji" || key === "event" || key === "error") continue;
    rest[key] = value;
  }
  return rest;
}

export class LoggerConsole implements Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: Record<string, string> = defaultEmojiMap,
    private readonly transports: LogTransport[] = []
  ) {}

  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(context?: LogContext): LogTemplate;
  trace(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("trace", contextOrMessage, message);
  }

  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(context?: LogContext): LogTemplate;
  debug(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("debug", contextOrMessage, message);
  }

  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(context?: LogContext): LogTemplate;
  info(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("info", contextOrMessage, message);
  }

  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(context?: LogContext): LogTemplate;
  warn(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("warn", contextOrMessage, message);
  }

  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(context?: LogContext): LogTemplate;
  error(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("error", contextOrMessage, message);
  }

  extend(namespace: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, namespace],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  /** transport 由所有 extend / append 出來的 logger 共用 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  /** 關閉所有 transport；任一關閉失敗時以第一個錯誤拒絕 */
  async close() {
    const transports = this.transports.splice(0);
    const results = await Promise.allSettled(
      transports.map((transport) => transport.close())
    );
    const failed = results.find(
      (r): r is PromiseRejectedResult => r.status === "rejected"
    );
    if (failed) throw failed.reason;
  }

  private dispatch(
    level: LogLevel,
    contextOrMessage: LogContext | string | undefined,
    message: string | undefined
  ): LogTemplate | undefined {
    if (typeof contextOrMessage === "string") {
      this.write(level, {}, contextOrMessage, contextOrMessage, {});
      return;
    }
    const context = contextOrMessage ?? {};
    if (message !== undefined) {
      this.write(level, context, message, message, {});
      return;
    }
    return (strings, ...values) => {
      let colored = strings[0];
      let plain = strings[0];
      const params: Record<string, unknown> = {};
      values.forEach((value, i) => {
        const text = typeof value === "string" ? value : safeStringify(value);
        colored += kleur.green(text) + strings[i + 1];
        plain += text + strings[i + 1];
        params[`__${i}`] = value;
      });
      this.write(level, context, colored, plain, params);
    };
  }

  private resolveEmoji(level: LogLevel, context: LogContext) {
    if (context.emoji) return context.emoji;
    if (context.event && this.emojiMap[context.event])
      return this.emojiMap[context.event];
    if (level === "warn" || level === "error") {
      if (this.emojiMap[level]) return this.emojiMap[level];
    }
    return this.context.emoji ?? this.emojiMap[level] ?? "";
  }

  private write(
    level: LogLevel,
    context: LogContext,
    coloredMsg: string,
    plainMsg: string,
    params: Record<string, unknown>
  ) {
    if (levelOrder[level] < levelOrder[this.level]) return;

    const time = new Date();
    const event = context.event ?? this.context.event ?? level;
    const rest = {
      ...withoutReserved(this.context),
      ...withoutReserved(context),
      ...params,
    };
    const errorValue = context.error ?? this.context.error;
    const err =
      errorValue === undefined ? undefined : serializeError(errorValue);

    const emoji = this.resolveEmoji(level, context);
    const label = [...this.path, event].join(":");
    const json = Object.keys(rest).length > 0 ? safeStringify(rest) : "";
    const line = [
      emoji,
      kleur.gray(format(time, "HH:mm:ss.SSS")),
      levelColor[level](level.toUpperCase()),
      `${label}: ${coloredMsg}`,
      json ? kleur.gray(json) : "",
    ]
      .filter((part) => part !== "")
      .join(" ");

    const print = consoleOf[level];
    print(line);
    if (err) print(err.stack ?? `${err.name}: ${err.message}`);

    const record: LogRecord = {
      time,
      level,
      path: this.path,
      event,
      msg: plainMsg,
      context: rest,
      err,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }
}
