import { appendFile } from "node:fs/promises";
import path from "node:path";

import { type Result, err, errorMessage, ok } from "~shared/utils/Result";

import type { LogEntry } from "@/types";

import { formatLog, logFileNameOf } from "./formatLog";
import type { LogWriteError, MetadataLogWriter } from "./MetadataLogWriter";

export class MetadataLogWriterFile implements MetadataLogWriter {
  async write(
    entries: readonly LogEntry[],
    directory: string,
    startedAt: Date
  ): Promise<Result<string, LogWriteError>> {
    const logPath = path.join(directory, logFileNameOf(startedAt));
    try {
      // 以附加模式寫入；同名檔案已存在時不覆蓋原內容
      await appendFile(logPath, formatLog(entries), "utf8");
      return ok(logPath);
    } catch (e) {
      return err({
        type: "LOG_WRITE_FAILED",
        path: logPath,
        message: errorMessage(e),
      });
    }
  }
}
