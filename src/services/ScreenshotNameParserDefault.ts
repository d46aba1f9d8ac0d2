import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { separator } from "@/constants";

import type {
  ParseError,
  ScreenshotMetadata,
  ScreenshotNameParser,
} from "./ScreenshotNameParser";

const numericToken = /^\d+(?:\.\d+)?$/;

export function stemOf(fileName: string) {
  const base = path.basename(fileName);
  return path.basename(base, path.extname(base));
}

/** 由解析結果還原檔名主體（不含副檔名） */
export function formatStem(meta: ScreenshotMetadata) {
  const segments = [
    meta.captureDate.text,
    meta.timestamp,
    meta.characterName,
    meta.eventType,
  ];
  if (meta.trailingToken !== undefined) segments.push(meta.trailingToken);
  return segments.join(separator);
}

function invalid(stem: string, message: string): Result<never, ParseError> {
  return err({ type: "INVALID_FORMAT", stem, message });
}

/**
 * 以分隔字元位置解析截圖檔名。
 *
 * 例如：
 *   2025-06-07_170210376_Night'Flyn_Hotkey     → 角色 Night'Flyn，事件 Hotkey
 *   2025-06-07_170210376_Night'Flyn_Hotkey_2   → 結尾 2 視為次要時間戳，事件仍為 Hotkey
 *
 * 限制：事件名稱本身若為純數字，會被誤判為結尾時間戳。
 */
export class ScreenshotNameParserDefault implements ScreenshotNameParser {
  parse(stem: string): Result<ScreenshotMetadata, ParseError> {
    if (!stem.startsWith("20")) {
      return invalid(stem, "檔名不是以 20xx 年份開頭");
    }
    if (stem.length < 10) {
      return invalid(stem, "檔名長度不足以包含 YYYY-MM-DD 日期");
    }
    const dateText = stem.slice(0, 10);

    const last = stem.lastIndexOf(separator);
    if (last === -1) {
      return invalid(stem, "找不到事件前的底線 (no underscore found for event)");
    }

    let eventSeparator = last;
    let eventType = stem.slice(last + 1);
    let trailingToken: string | undefined;
    if (numericToken.test(eventType)) {
      // 結尾為數字 → 視為次要時間戳，事件在倒數第二個底線之後
      trailingToken = eventType;
      eventSeparator = last > 0 ? stem.lastIndexOf(separator, last - 1) : -1;
      if (eventSeparator === -1) {
        return invalid(stem, "結尾為數字，但找不到事件前的底線");
      }
      eventType = stem.slice(eventSeparator + 1, last);
    }

    const first = stem.indexOf(separator);
    const second = stem.indexOf(separator, first + 1);
    if (second === -1) {
      return invalid(stem, "底線數量不足，無法定位角色名稱");
    }
    const characterName = stem.slice(second + 1, eventSeparator);

    if (characterName === "") {
      return invalid(stem, "角色名稱為空（至少需要三個底線分隔）");
    }
    if (eventType === "") {
      return invalid(stem, "事件名稱為空");
    }

    return ok({
      captureDate: {
        text: dateText,
        year: dateText.slice(0, 4),
        month: dateText.slice(5, 7),
        day: dateText.slice(8, 10),
      },
      timestamp: stem.slice(first + 1, second),
      characterName,
      eventType,
      trailingToken,
    });
  }
}
