import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerOrganize } from "./app/Organize";

const logger = createDefaultLoggerFromEnv();
const cli = cac("screenshot-sorter");

registerOrganize(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await logger
    .close()
    .catch((error: unknown) => logger.warn({ error }, "關閉 log 檔失敗"));
}
