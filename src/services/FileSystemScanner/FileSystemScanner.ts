import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  path: string;
  message: string;
};

export type ScanOptions = {
  /** 預設只掃描單層 */
  recursive?: boolean;
  /** 允許的副檔名（不分大小寫，可省略開頭的點）；空陣列表示不限 */
  allowExts?: readonly string[];
};

export interface FileSystemScanner {
  /** 回傳依完整路徑排序的檔案清單 */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}
