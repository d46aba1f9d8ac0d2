import { format } from "date-fns";

import { logFileSuffix, logTimestampFormat } from "@/constants";
import type { LogEntry } from "@/types";

export function logFileNameOf(startedAt: Date) {
  return `${format(startedAt, logTimestampFormat)}${logFileSuffix}`;
}

export function formatLogEntry(entry: LogEntry) {
  const lines = [`File: ${entry.sourceFileName}`, `Status: ${entry.outcome}`];
  if (entry.outcome !== "skipped") {
    const { captureDate, characterName, eventType } = entry.metadata;
    lines.push(
      `Year: ${captureDate.year}`,
      `Month: ${captureDate.month}`,
      `Day: ${captureDate.day}`,
      `Character: ${characterName}`,
      `Event: ${eventType}`,
      `Destination: ${entry.destinationPath}`
    );
  }
  if (entry.outcome !== "moved") {
    lines.push(`Error: ${entry.error.message}`);
  }
  return lines.join("\n");
}

/** 每筆一段，段落間空一行，結尾保留換行 */
export function formatLog(entries: readonly LogEntry[]) {
  return entries.map((entry) => formatLogEntry(entry) + "\n").join("\n");
}
