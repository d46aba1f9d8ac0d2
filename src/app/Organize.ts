import type { CAC } from "cac";
import path from "node:path";

import type { DumpWriter } from "~shared/DumpWriter/DumpWriter";
import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr, isOk } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { imageExtensions } from "@/constants";
import type { BatchOrganizer } from "@/services/BatchOrganizer";
import { createBatchOrganizer } from "@/services/BatchOrganizerDefault";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import type { BatchPlan, BatchResult, PlannedFile } from "@/types";
import { confirm, expandHome } from "@/utils/helper";

export type OrganizeOptions = {
  dryRun?: boolean;
  yes?: boolean;
};

type OrganizeFolderOptions = OrganizeOptions & {
  recursive?: boolean;
};

export type OrganizeDeps = {
  organizer: BatchOrganizer;
  reporter: DumpWriter;
  confirm: (question: string) => Promise<boolean>;
};

export function registerOrganize(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "organize <...files>",
      "依截圖檔名整理至 角色/事件/年/月/日 目錄"
    )
    .option("--dry-run", "只產生搬移計劃，不實際搬移", { default: false })
    .option("--yes", "略過確認，直接執行搬移", { default: false })
    .action(async (files: string[], options: OrganizeOptions) => {
      const logger = baseLogger.extend("organize");
      const result = await runOrganize(
        files.map((f) => path.resolve(expandHome(f))),
        options,
        logger,
        buildDeps(logger)
      );
      if (result && hasFailures(result)) process.exitCode = 1;
    });

  cli
    .command("organize-folder <folder>", "整理資料夾內所有截圖檔案")
    .option(
      "--recursive",
      "遞迴掃描子資料夾，已位於 角色/事件/年/月/日 目錄的檔案略過",
      { default: false }
    )
    .option("--dry-run", "只產生搬移計劃，不實際搬移", { default: false })
    .option("--yes", "略過確認，直接執行搬移", { default: false })
    .action(async (folder: string, options: OrganizeFolderOptions) => {
      const logger = baseLogger.extend("organize-folder", { folder });
      const root = path.resolve(expandHome(folder));

      const scanner = new FileSystemScannerDefault();
      const scanRes = await scanner.scan(root, {
        recursive: options.recursive,
        allowExts: imageExtensions,
      });
      if (isErr(scanRes)) {
        logger.error({
          emoji: "❌",
          error: scanRes.error,
        })`掃描來源目錄失敗`;
        process.exitCode = 1;
        return;
      }
      const deps = buildDeps(logger);
      const arranged = deps.organizer
        .plan(scanRes.value)
        .files.filter(isAlreadyArranged)
        .map((file) => file.sourcePath);
      if (arranged.length > 0) {
        logger.info({
          emoji: "⏭️",
          count: arranged.length,
        })`已在目標目錄，略過 ${arranged.length} 個檔案`;
      }
      const pending = scanRes.value.filter((f) => !arranged.includes(f));
      if (pending.length === 0) {
        logger.warn("來源目錄沒有可處理的圖片檔案");
        return;
      }
      logger.info({
        emoji: "🔎",
        count: pending.length,
      })`掃描完成，共 ${pending.length} 個圖片檔案`;

      const result = await runOrganize(
        pending,
        options,
        logger,
        deps
      );
      if (result && hasFailures(result)) process.exitCode = 1;
    });
}

function buildDeps(logger: Logger): OrganizeDeps {
  const { SORTER_REPORT_DIR } = getAppConfig();
  return {
    organizer: createBatchOrganizer({ logger }),
    reporter: new DumpWriterDefault(logger, SORTER_REPORT_DIR),
    confirm,
  };
}

/** 檔案已位於自身檔名對應的 角色/事件/年/月/日 目錄 */
export function isAlreadyArranged(file: PlannedFile) {
  if (!file.ok) return false;
  const { characterName, eventType, captureDate } = file.metadata;
  const expected = path.join(
    characterName,
    eventType,
    captureDate.year,
    captureDate.month,
    captureDate.day
  );
  return path.dirname(file.sourcePath).endsWith(path.sep + expected);
}

export function hasFailures(result: BatchResult) {
  return (
    result.summary.errored > 0 ||
    (result.logFile !== null && isErr(result.logFile))
  );
}

/**
 * 規劃 → 輸出計劃報告 → 確認 → 執行。
 * dry-run 或使用者取消時回傳 undefined。
 */
export async function runOrganize(
  files: string[],
  options: OrganizeOptions,
  logger: Logger,
  deps: OrganizeDeps
): Promise<BatchResult | undefined> {
  const plan = deps.organizer.plan(files);
  await deps.reporter.dump("organize-plan", summarizePlan(plan));
  logger.info({
    emoji: "📝",
    valid: plan.valid,
    invalid: plan.invalid,
  })`搬移計劃已輸出：可搬移 ${plan.valid} 個，格式不符 ${plan.invalid} 個`;

  if (options.dryRun) {
    logger.info({ emoji: "🧪" })`dry-run 模式，不進行搬移`;
    return;
  }

  const proceed =
    options.yes ||
    (await deps.confirm(
      `即將處理 ${files.length} 個檔案（可搬移 ${plan.valid} 個），` +
        "是否繼續？ [y/N] "
    ));
  if (!proceed) {
    logger.warn({ emoji: "⏹️" })`使用者取消`;
    return;
  }

  const result = await deps.organizer.processBatch(files);
  const { moved, skipped, errored } = result.summary;
  const logPath =
    result.logFile && isOk(result.logFile) ? result.logFile.value : "-";
  if (hasFailures(result)) {
    logger.warn({
      event: "done",
      emoji: "⚠️",
      moved,
      skipped,
      errored,
    })`完成，但有檔案處理失敗：搬移 ${moved}、略過 ${skipped}、失敗 ${errored}，log: ${logPath}`;
  } else {
    logger.info({
      event: "done",
      emoji: "✅",
      moved,
      skipped,
      errored,
    })`全部完成：搬移 ${moved}、略過 ${skipped}，log: ${logPath}`;
  }
  return result;
}

export function summarizePlan(plan: BatchPlan) {
  const targets = new Map<string, string[]>();
  const moves: Array<{ from: string; to: string }> = [];
  const invalid: Array<{ file: string; reason: string }> = [];

  for (const file of plan.files) {
    if (!file.ok) {
      invalid.push({ file: file.sourcePath, reason: file.error.message });
      continue;
    }
    const to = file.pathPlan.destinationPath;
    moves.push({ from: file.sourcePath, to });
    const sources = targets.get(to) ?? [];
    sources.push(file.sourcePath);
    targets.set(to, sources);
  }

  // 同一目標出現多次時，後搬移者會覆蓋前者
  const duplicateTargets = Object.fromEntries(
    [...targets.entries()].filter(([, sources]) => sources.length > 1)
  );

  return {
    total: plan.files.length,
    valid: plan.valid,
    invalid: plan.invalid,
    moves,
    invalidFiles: invalid,
    duplicateTargets,
  };
}
