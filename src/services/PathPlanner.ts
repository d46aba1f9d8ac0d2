import type { PathPlan } from "@/types";

import type { ScreenshotMetadata } from "./ScreenshotNameParser";

export interface PathPlanner {
  /**
   * 依解析結果產生目標路徑：
   * <parent>/<角色>/<事件>/<YYYY>/<MM>/<DD>/<原檔名>
   */
  plan(
    metadata: ScreenshotMetadata,
    parentDirectory: string,
    fileName: string
  ): PathPlan;
}
