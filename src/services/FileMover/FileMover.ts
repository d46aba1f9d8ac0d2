import type { Result } from "~shared/utils/Result";

export type FsError = {
  type: "IO_ERROR";
  operation: "ensureDirectory" | "moveFile";
  path: string;
  /** 例如 ENOENT、EACCES、EXDEV */
  code?: string;
  message: string;
};

export interface FileMover {
  /** 遞迴建立目錄；已存在時視為成功 */
  ensureDirectory(dirPath: string): Promise<Result<void, FsError>>;

  /** 搬移檔案，目標已存在時直接覆蓋 */
  moveFile(source: string, destination: string): Promise<Result<void, FsError>>;
}
