import type { Result } from "~shared/utils/Result";

export type CaptureDate = {
  /** 檔名開頭 10 個字元，原樣保留，例如 2025-06-07 */
  text: string;
  year: string;
  month: string;
  day: string;
};

export type ScreenshotMetadata = Readonly<{
  captureDate: CaptureDate;
  timestamp: string;
  characterName: string;
  eventType: string;
  /** 事件後方的數字段（次要時間戳），沒有則為 undefined */
  trailingToken?: string;
}>;

export type ParseError = {
  type: "INVALID_FORMAT";
  stem: string;
  message: string;
};

export interface ScreenshotNameParser {
  /**
   * 解析不含副檔名的檔名。
   * 格式：YYYY-MM-DD_<timestamp>_<characterName>_<eventType>
   */
  parse(stem: string): Result<ScreenshotMetadata, ParseError>;
}
