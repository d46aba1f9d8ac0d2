import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import type {
  BatchPlan,
  BatchResult,
  BatchSummary,
  LogEntry,
  PlannedFile,
} from "@/types";

import type { BatchOrganizer } from "./BatchOrganizer";
import { type FileMover, FileMoverNode } from "./FileMover";
import { type MetadataLogWriter, MetadataLogWriterFile } from "./MetadataLog";
import type { PathPlanner } from "./PathPlanner";
import { PathPlannerDefault } from "./PathPlannerDefault";
import type { ScreenshotNameParser } from "./ScreenshotNameParser";
import {
  ScreenshotNameParserDefault,
  stemOf,
} from "./ScreenshotNameParserDefault";

export type BatchOrganizerDeps = {
  parser: ScreenshotNameParser;
  planner: PathPlanner;
  fileMover: FileMover;
  logWriter: MetadataLogWriter;
  logger: Logger;
  now?: () => Date;
};

export function summarize(entries: readonly LogEntry[]): BatchSummary {
  const summary = { total: entries.length, moved: 0, skipped: 0, errored: 0 };
  for (const entry of entries) {
    if (entry.outcome === "moved") summary.moved++;
    else if (entry.outcome === "skipped") summary.skipped++;
    else summary.errored++;
  }
  return summary;
}

export class BatchOrganizerDefault implements BatchOrganizer {
  private readonly parser: ScreenshotNameParser;
  private readonly planner: PathPlanner;
  private readonly fileMover: FileMover;
  private readonly logWriter: MetadataLogWriter;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: BatchOrganizerDeps) {
    this.parser = deps.parser;
    this.planner = deps.planner;
    this.fileMover = deps.fileMover;
    this.logWriter = deps.logWriter;
    this.logger = deps.logger.extend("BatchOrganizer");
    this.now = deps.now ?? (() => new Date());
  }

  plan(files: readonly string[]): BatchPlan {
    const planned = files.map((file) => this.planFile(file));
    const valid = planned.filter((p) => p.ok).length;
    return { files: planned, valid, invalid: planned.length - valid };
  }

  async processBatch(files: readonly string[]): Promise<BatchResult> {
    // 批次開始時間只取一次，log 檔名以此命名
    const startedAt = this.now();
    const logger = this.logger.extend("processBatch", { total: files.length });
    const entries: LogEntry[] = [];

    for (const [index, sourcePath] of files.entries()) {
      const entry = await this.processFile(sourcePath);
      entries.push(entry);
      const progress = `${index + 1}/${files.length}`;
      switch (entry.outcome) {
        case "moved":
          logger.info({
            event: "moved",
            emoji: "📦",
            from: entry.sourcePath,
            to: entry.destinationPath,
          })`${entry.sourceFileName} 搬移完成 (${progress})`;
          break;
        case "skipped":
          logger.warn({
            event: "skipped",
            emoji: "⏭️",
            reason: entry.error.message,
          })`${entry.sourceFileName} 檔名格式不符，略過 (${progress})`;
          break;
        case "error":
          logger.error({
            event: "io-error",
            emoji: "🧨",
            error: entry.error,
          })`${entry.sourceFileName} 處理失敗 (${progress})`;
          break;
      }
    }

    const summary = summarize(entries);
    if (files.length === 0) {
      return { startedAt, entries, summary, logFile: null };
    }

    const logFile = await this.logWriter.write(
      entries,
      path.dirname(files[0]),
      startedAt
    );
    if (isErr(logFile)) {
      logger.warn({
        event: "log-write-failed",
        emoji: "🧾",
        error: logFile.error,
      })`log 檔寫入失敗：${logFile.error.path}`;
    } else {
      logger.info({ emoji: "🧾", file: logFile.value })`已寫入 log`;
    }
    return { startedAt, entries, summary, logFile };
  }

  private planFile(sourcePath: string): PlannedFile {
    const parsed = this.parser.parse(stemOf(sourcePath));
    if (isErr(parsed)) {
      return { sourcePath, ok: false, error: parsed.error };
    }
    const pathPlan = this.planner.plan(
      parsed.value,
      path.dirname(sourcePath),
      path.basename(sourcePath)
    );
    return { sourcePath, ok: true, metadata: parsed.value, pathPlan };
  }

  private async processFile(sourcePath: string): Promise<LogEntry> {
    const sourceFileName = path.basename(sourcePath);
    const planned = this.planFile(sourcePath);
    if (!planned.ok) {
      return {
        outcome: "skipped",
        sourcePath,
        sourceFileName,
        error: planned.error,
      };
    }

    const { metadata, pathPlan } = planned;
    const base = {
      sourcePath,
      sourceFileName,
      metadata,
      destinationPath: pathPlan.destinationPath,
    };

    for (const dir of pathPlan.directories) {
      const ensured = await this.fileMover.ensureDirectory(dir);
      if (isErr(ensured)) {
        return { ...base, outcome: "error", error: ensured.error };
      }
    }

    const moved = await this.fileMover.moveFile(
      sourcePath,
      pathPlan.destinationPath
    );
    if (isErr(moved)) {
      return { ...base, outcome: "error", error: moved.error };
    }
    return { ...base, outcome: "moved" };
  }
}

export function createBatchOrganizer(deps: {
  logger: Logger;
  now?: () => Date;
}) {
  return new BatchOrganizerDefault({
    parser: new ScreenshotNameParserDefault(),
    planner: new PathPlannerDefault(),
    fileMover: new FileMoverNode(),
    logWriter: new MetadataLogWriterFile(),
    logger: deps.logger,
    now: deps.now,
  });
}
