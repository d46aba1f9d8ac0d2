import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/** 以 JSON lines 格式寫入可輪替的檔案 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;
  /** 第一次寫檔失敗的錯誤，之後的紀錄不再寫入 */
  private failure?: Error;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, {
      size: "10M",
      maxFiles: 10,
      ...options.rfs,
    });
    this.stream.on("error", (error) => {
      if (this.failure) return;
      this.failure = error;
      console.error(`log 檔寫入失敗: ${error.message}`);
    });
  }

  write(record: LogRecord) {
    if (this.failure) return;
    const line = JSON.stringify({
      time: record.time.toISOString(),
      level: record.level,
      path: record.path.join(":"),
      event: record.event,
      msg: record.msg,
      ...record.context,
      err: record.err,
    });
    this.stream.write(line + "\n");
  }

  close() {
    const failure = this.failure;
    if (failure) {
      this.stream.destroy();
      return Promise.reject(failure);
    }
    return new Promise<void>((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}
