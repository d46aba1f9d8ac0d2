import {
  type StaticDecode,
  type TObject,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export type EnvSource = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`環境變數設定不合法: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** "true" / "1" → true，"false" / "0" → false */
export function envBoolean() {
  return t
    .Transform(
      t.Union([
        t.Literal("true"),
        t.Literal("false"),
        t.Literal("1"),
        t.Literal("0"),
      ])
    )
    .Decode((v) => v === "true" || v === "1")
    .Encode((v): "true" | "false" => (v ? "true" : "false"));
}

export function envNumber() {
  return t
    .Transform(t.String({ pattern: "^-?\\d+(\\.\\d+)?$" }))
    .Decode((v) => Number(v))
    .Encode((v) => String(v));
}

/**
 * 以 typebox schema 宣告需要的環境變數，回傳一個會快取結果的取值函式。
 * 只讀取 schema 中宣告的 key；空字串視同未設定。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: EnvSource = process.env
) {
  let cached: StaticDecode<T> | undefined;
  return (): StaticDecode<T> => {
    if (cached !== undefined) return cached;

    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }

    if (!Value.Check(schema, picked)) {
      const issues = [...Value.Errors(schema, picked)].map(
        (e) => `${e.path.replace(/^\//, "")}: ${e.message}`
      );
      throw new ConfigError(issues);
    }
    cached = Value.Decode(schema, picked);
    return cached;
  };
}
