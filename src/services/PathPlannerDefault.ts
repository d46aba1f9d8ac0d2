import path from "node:path";

import type { PathPlan } from "@/types";

import type { PathPlanner } from "./PathPlanner";
import type { ScreenshotMetadata } from "./ScreenshotNameParser";

export class PathPlannerDefault implements PathPlanner {
  plan(
    metadata: ScreenshotMetadata,
    parentDirectory: string,
    fileName: string
  ): PathPlan {
    // 角色與事件名稱原樣作為目錄名稱，不做任何清理
    const characterDir = path.join(parentDirectory, metadata.characterName);
    const eventDir = path.join(characterDir, metadata.eventType);
    const yearDir = path.join(eventDir, metadata.captureDate.year);
    const monthDir = path.join(yearDir, metadata.captureDate.month);
    const dayDir = path.join(monthDir, metadata.captureDate.day);

    return {
      directories: [characterDir, eventDir, yearDir, monthDir, dayDir],
      destinationPath: path.join(dayDir, fileName),
    };
  }
}
