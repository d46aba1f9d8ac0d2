import { type Result, err, ok } from "~shared/utils/Result";

import {
  type LogWriteError,
  type MetadataLogWriter,
  logFileNameOf,
} from "@/services/MetadataLog";
import type { LogEntry } from "@/types";

export class MetadataLogWriterFake implements MetadataLogWriter {
  readonly writes: Array<{
    entries: LogEntry[];
    directory: string;
    startedAt: Date;
  }> = [];
  failWith?: string;

  async write(
    entries: readonly LogEntry[],
    directory: string,
    startedAt: Date
  ): Promise<Result<string, LogWriteError>> {
    this.writes.push({ entries: [...entries], directory, startedAt });
    const logPath = `${directory}/${logFileNameOf(startedAt)}`;
    if (this.failWith) {
      return err({
        type: "LOG_WRITE_FAILED",
        path: logPath,
        message: this.failWith,
      });
    }
    return ok(logPath);
  }
}
