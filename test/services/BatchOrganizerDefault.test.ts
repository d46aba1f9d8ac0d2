import {
  mkdir,
  mkdtemp,
  readFile,
  readdir,
  rm,
  writeFile,
} from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import {
  BatchOrganizerDefault,
  createBatchOrganizer,
} from "@/services/BatchOrganizerDefault";
import { formatLog } from "@/services/MetadataLog";
import { PathPlannerDefault } from "@/services/PathPlannerDefault";
import { ScreenshotNameParserDefault } from "@/services/ScreenshotNameParserDefault";

import { FileMoverFake } from "~test/fakes/FileMoverFake";
import { MetadataLogWriterFake } from "~test/fakes/MetadataLogWriterFake";

const startedAt = new Date(2025, 5, 7, 17, 2, 10);

function buildContext() {
  const fileMover = new FileMoverFake();
  const logWriter = new MetadataLogWriterFake();
  const now = vi.fn(() => startedAt);
  const organizer = new BatchOrganizerDefault({
    parser: new ScreenshotNameParserDefault(),
    planner: new PathPlannerDefault(),
    fileMover,
    logWriter,
    logger: buildTestLogger(),
    now,
  });
  return { fileMover, logWriter, now, organizer };
}

describe("BatchOrganizerDefault", () => {
  test("搬移到 角色/事件/年/月/日 目錄", async () => {
    const { fileMover, organizer } = buildContext();
    const source = "/shots/2025-06-07_170210376_Night'Flyn_Hotkey.png";
    fileMover.seedFile(source);

    const result = await organizer.processBatch([source]);

    expect(result.entries).toHaveLength(1);
    expect(result.entries[0]).toMatchObject({
      outcome: "moved",
      sourceFileName: "2025-06-07_170210376_Night'Flyn_Hotkey.png",
      destinationPath:
        "/shots/Night'Flyn/Hotkey/2025/06/07/2025-06-07_170210376_Night'Flyn_Hotkey.png",
    });
    expect(fileMover.ensuredDirectories).toEqual([
      "/shots/Night'Flyn",
      "/shots/Night'Flyn/Hotkey",
      "/shots/Night'Flyn/Hotkey/2025",
      "/shots/Night'Flyn/Hotkey/2025/06",
      "/shots/Night'Flyn/Hotkey/2025/06/07",
    ]);
    expect(fileMover.files.has(source)).toBe(false);
  });

  test("格式不符的檔案略過後繼續處理其餘檔案", async () => {
    const { fileMover, organizer } = buildContext();
    const files = [
      "/shots/2025-06-07_1_Hero_Loot.png",
      "/shots/holiday.png",
      "/shots/2025-06-08_2_Mage_Kill.png",
      "/shots/2025-06-09_3_Rogue_Level Up.png",
    ];
    files.forEach((f) => fileMover.seedFile(f));

    const result = await organizer.processBatch(files);

    expect(result.entries.map((e) => e.outcome)).toEqual([
      "moved",
      "skipped",
      "moved",
      "moved",
    ]);
    expect(result.summary).toEqual({
      total: 4,
      moved: 3,
      skipped: 1,
      errored: 0,
    });
    expect(fileMover.moves.map((m) => m.to)).toEqual([
      "/shots/Hero/Loot/2025/06/07/2025-06-07_1_Hero_Loot.png",
      "/shots/Mage/Kill/2025/06/08/2025-06-08_2_Mage_Kill.png",
      "/shots/Rogue/Level Up/2025/06/09/2025-06-09_3_Rogue_Level Up.png",
    ]);
    expect(fileMover.files.has("/shots/holiday.png")).toBe(true);
  });

  test("單一檔案 IO 失敗只標記該檔案", async () => {
    const { fileMover, organizer } = buildContext();
    const files = [
      "/shots/2025-06-07_1_Hero_Loot.png",
      "/shots/2025-06-08_2_Mage_Kill.png",
    ];
    files.forEach((f) => fileMover.seedFile(f));
    fileMover.failOn("/shots/Hero/Loot", {
      type: "IO_ERROR",
      operation: "ensureDirectory",
      path: "/shots/Hero/Loot",
      code: "EACCES",
      message: "EACCES: permission denied, mkdir '/shots/Hero/Loot'",
    });

    const result = await organizer.processBatch(files);

    const [first, second] = result.entries;
    expect(first.outcome).toBe("error");
    if (first.outcome === "error") {
      expect(first.error.message).toBe(
        "EACCES: permission denied, mkdir '/shots/Hero/Loot'"
      );
      expect(first.destinationPath).toBe(
        "/shots/Hero/Loot/2025/06/07/2025-06-07_1_Hero_Loot.png"
      );
    }
    expect(second.outcome).toBe("moved");
    expect(result.summary.errored).toBe(1);
    expect(result.summary.moved).toBe(1);
  });

  test("來源不存在時記錄為 error", async () => {
    const { organizer } = buildContext();

    const result = await organizer.processBatch([
      "/shots/2025-06-07_1_Hero_Loot.png",
    ]);

    expect(result.entries[0].outcome).toBe("error");
    if (result.entries[0].outcome === "error") {
      expect(result.entries[0].error.code).toBe("ENOENT");
    }
  });

  test("log 只在第一個檔案所在目錄寫入一次，且依輸入順序", async () => {
    const { fileMover, logWriter, now, organizer } = buildContext();
    const files = [
      "/a/2025-06-07_1_Hero_Loot.png",
      "/b/bad.png",
      "/c/2025-06-08_2_Mage_Kill.png",
    ];
    files.forEach((f) => fileMover.seedFile(f));

    const result = await organizer.processBatch(files);

    expect(now).toHaveBeenCalledTimes(1);
    expect(logWriter.writes).toHaveLength(1);
    const [write] = logWriter.writes;
    expect(write.directory).toBe("/a");
    expect(write.startedAt).toBe(startedAt);
    expect(write.entries.map((e) => e.sourcePath)).toEqual(files);
    expect(result.logFile).toEqual({
      ok: true,
      value: "/a/2025-06-07_170210_Metadata_Log.txt",
    });
  });

  test("空批次不寫 log", async () => {
    const { logWriter, organizer } = buildContext();

    const result = await organizer.processBatch([]);

    expect(result.entries).toEqual([]);
    expect(result.logFile).toBeNull();
    expect(logWriter.writes).toHaveLength(0);
  });

  test("log 寫入失敗不影響已完成的搬移", async () => {
    const { fileMover, logWriter, organizer } = buildContext();
    fileMover.seedFile("/shots/2025-06-07_1_Hero_Loot.png");
    logWriter.failWith = "EROFS: read-only file system";

    const result = await organizer.processBatch([
      "/shots/2025-06-07_1_Hero_Loot.png",
    ]);

    expect(result.entries[0].outcome).toBe("moved");
    expect(result.logFile).toEqual({
      ok: false,
      error: {
        type: "LOG_WRITE_FAILED",
        path: "/shots/2025-06-07_170210_Metadata_Log.txt",
        message: "EROFS: read-only file system",
      },
    });
  });

  test("plan 不觸碰檔案系統", () => {
    const { fileMover, logWriter, organizer } = buildContext();

    const plan = organizer.plan([
      "/shots/2025-06-07_1_Hero_Loot.png",
      "/shots/holiday.png",
    ]);

    expect(plan.valid).toBe(1);
    expect(plan.invalid).toBe(1);
    const [valid] = plan.files;
    expect(valid.ok).toBe(true);
    if (valid.ok) {
      expect(valid.pathPlan.destinationPath).toBe(
        "/shots/Hero/Loot/2025/06/07/2025-06-07_1_Hero_Loot.png"
      );
    }
    expect(fileMover.ensuredDirectories).toEqual([]);
    expect(logWriter.writes).toEqual([]);
  });
});

describe("createBatchOrganizer（實際檔案系統）", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "batch-organizer-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("搬移、覆蓋既有檔案並寫出 log", async () => {
    const names = [
      "2025-06-07_170210376_Night'Flyn_Hotkey.png",
      "not-a-screenshot.png",
      "2025-06-08_170210999_Night'Flyn_Kill.jpg",
    ];
    for (const name of names) {
      await writeFile(path.join(tmpDir, name), `content of ${name}`);
    }
    const existingDir = path.join(
      tmpDir,
      "Night'Flyn",
      "Kill",
      "2025",
      "06",
      "08"
    );
    await mkdir(existingDir, { recursive: true });
    await writeFile(path.join(existingDir, names[2]), "stale");

    const organizer = createBatchOrganizer({
      logger: buildTestLogger(),
      now: () => startedAt,
    });
    const result = await organizer.processBatch(
      names.map((n) => path.join(tmpDir, n))
    );

    expect(result.summary).toEqual({
      total: 3,
      moved: 2,
      skipped: 1,
      errored: 0,
    });
    expect(
      await readFile(
        path.join(tmpDir, "Night'Flyn", "Hotkey", "2025", "06", "07", names[0]),
        "utf8"
      )
    ).toBe(`content of ${names[0]}`);
    expect(await readFile(path.join(existingDir, names[2]), "utf8")).toBe(
      `content of ${names[2]}`
    );

    const logPath = path.join(tmpDir, "2025-06-07_170210_Metadata_Log.txt");
    expect(result.logFile).toEqual({ ok: true, value: logPath });
    const logText = await readFile(logPath, "utf8");
    expect(logText).toBe(formatLog(result.entries));
    expect(logText.split("\n\n")).toHaveLength(3);

    expect((await readdir(tmpDir)).sort()).toEqual(
      [
        "2025-06-07_170210_Metadata_Log.txt",
        "Night'Flyn",
        "not-a-screenshot.png",
      ].sort()
    );
  });
});
