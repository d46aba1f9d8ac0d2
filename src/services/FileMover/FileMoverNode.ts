import { mkdir, rename } from "node:fs/promises";

import { type Result, err, errorMessage, ok } from "~shared/utils/Result";

import type { FileMover, FsError } from "./FileMover";

function errorCode(e: unknown) {
  if (typeof e === "object" && e !== null && "code" in e) {
    return typeof e.code === "string" ? e.code : undefined;
  }
  return undefined;
}

export class FileMoverNode implements FileMover {
  async ensureDirectory(dirPath: string): Promise<Result<void, FsError>> {
    try {
      await mkdir(dirPath, { recursive: true });
      return ok();
    } catch (e) {
      return err({
        type: "IO_ERROR",
        operation: "ensureDirectory",
        path: dirPath,
        code: errorCode(e),
        message: errorMessage(e),
      });
    }
  }

  async moveFile(
    source: string,
    destination: string
  ): Promise<Result<void, FsError>> {
    try {
      // rename 會直接取代既有的同名檔案
      await rename(source, destination);
      return ok();
    } catch (e) {
      return err({
        type: "IO_ERROR",
        operation: "moveFile",
        path: source,
        code: errorCode(e),
        message: errorMessage(e),
      });
    }
  }
}
