import type { BatchPlan, BatchResult } from "@/types";

export interface BatchOrganizer {
  /** 只解析與規劃路徑，不觸碰檔案系統 */
  plan(files: readonly string[]): BatchPlan;

  /**
   * 依輸入順序逐一處理檔案：解析 → 規劃 → 建立目錄 → 搬移。
   * 單一檔案失敗只記錄在結果中，不會中斷整批。
   * 批次非空時，在第一個檔案所在目錄寫入一份 log。
   */
  processBatch(files: readonly string[]): Promise<BatchResult>;
}
