import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, errorMessage, ok } from "~shared/utils/Result";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? false;
    const allowExtsSet = new Set(
      allowExts.map((e) =>
        e.startsWith(".") ? e.toLowerCase() : `.${e.toLowerCase()}`
      )
    );
    try {
      const dirents = await readdir(rootPath, {
        recursive: isRecursive,
        withFileTypes: true,
      });
      const fullPaths = dirents
        .filter((d) => {
          if (!d.isFile()) return false;
          if (allowExtsSet.size === 0) return true;
          return allowExtsSet.has(path.extname(d.name).toLowerCase());
        })
        .map((d) => path.join(d.parentPath, d.name))
        .sort((a, b) => a.localeCompare(b));
      return ok(fullPaths);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        path: rootPath,
        message: errorMessage(e),
      });
    }
  }
}
