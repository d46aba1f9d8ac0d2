export const separator = "_";

export const logFileSuffix = "_Metadata_Log.txt";

/** log 檔名的時間格式（date-fns） */
export const logTimestampFormat = "yyyy-MM-dd_HHmmss";

export const imageExtensions = [
  ".png",
  ".jpg",
  ".jpeg",
  ".bmp",
  ".gif",
  ".webp",
  ".tif",
  ".tiff",
  ".heic",
] as const;
