import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    /** 搬移計劃報告輸出目錄，預設 dist/reports */
    SORTER_REPORT_DIR: t.Optional(t.String()),
  })
);
