import type { FsError } from "@/services/FileMover/FileMover";
import type { LogWriteError } from "@/services/MetadataLog/MetadataLogWriter";
import type {
  ParseError,
  ScreenshotMetadata,
} from "@/services/ScreenshotNameParser";

import type { Result } from "~shared/utils/Result";

export type PathPlan = {
  /** characterDir → eventDir → yearDir → monthDir → dayDir，逐層巢狀 */
  directories: [string, string, string, string, string];
  destinationPath: string;
};

type EntryBase = {
  sourcePath: string;
  sourceFileName: string;
};

export type MovedEntry = EntryBase & {
  outcome: "moved";
  metadata: ScreenshotMetadata;
  destinationPath: string;
};

export type SkippedEntry = EntryBase & {
  outcome: "skipped";
  error: ParseError;
};

export type ErroredEntry = EntryBase & {
  outcome: "error";
  metadata: ScreenshotMetadata;
  destinationPath: string;
  error: FsError;
};

export type LogEntry = MovedEntry | SkippedEntry | ErroredEntry;

export type BatchSummary = {
  total: number;
  moved: number;
  skipped: number;
  errored: number;
};

export type BatchResult = {
  startedAt: Date;
  entries: LogEntry[];
  summary: BatchSummary;
  /** 空批次不寫 log，為 null */
  logFile: Result<string, LogWriteError> | null;
};

export type PlannedFile =
  | {
      sourcePath: string;
      ok: true;
      metadata: ScreenshotMetadata;
      pathPlan: PathPlan;
    }
  | { sourcePath: string; ok: false; error: ParseError };

export type BatchPlan = {
  files: PlannedFile[];
  valid: number;
  invalid: number;
};
