import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly dir = "dist/reports",
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = logger.extend("dump");
  }

  async dump(name: string, data: unknown) {
    await mkdir(this.dir, { recursive: true });
    const fileName = `${format(this.now(), "yyyyMMdd-HHmmss")}-${name}.json`;
    const filePath = path.join(this.dir, fileName);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "🗂️", file: filePath })`已輸出報告 ${name}`;
    return filePath;
  }
}
