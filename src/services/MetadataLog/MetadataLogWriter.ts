import type { Result } from "~shared/utils/Result";

import type { LogEntry } from "@/types";

export type LogWriteError = {
  type: "LOG_WRITE_FAILED";
  path: string;
  message: string;
};

export interface MetadataLogWriter {
  /**
   * 將整批紀錄寫成單一文字檔，檔名以批次開始時間命名。
   * 成功時回傳寫入的檔案路徑。
   */
  write(
    entries: readonly LogEntry[],
    directory: string,
    startedAt: Date
  ): Promise<Result<string, LogWriteError>>;
}
