// ---------------------------------------------------------------------------
// Config – process settings from environment variables
// ---------------------------------------------------------------------------
// Every variable is optional. Values are coerced from strings, defaults are
// applied by the schema, and all problems are reported together.
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";
import { DEFAULT_CACHE_TTL_MS } from "../cache/result-cache.js";
import { DEFAULT_CHAT_MODEL } from "../llm/chat-client.js";
import { DEFAULT_HISTORY_LIMIT } from "../orchestrator/history.js";
import { checkValue, literalUnion } from "../schema/typebox.js";
import { DEFAULT_LADDER_DAYS } from "../sufficiency/types.js";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export const AppConfigSchema = Type.Object({
  host: Type.String({ minLength: 1, default: "0.0.0.0" }),
  port: Type.Integer({ minimum: 0, maximum: 65535, default: 8000 }),
  logLevel: literalUnion(LOG_LEVELS),
  graphPath: Type.String({ minLength: 1, default: "config/graph.yaml" }),
  cacheTtlMs: Type.Integer({ minimum: 1, default: DEFAULT_CACHE_TTL_MS }),
  /** 0 disables the engine-wide unit timeout. */
  unitTimeoutMs: Type.Integer({ minimum: 0, default: 0 }),
  historyLimit: Type.Integer({ minimum: 1, default: DEFAULT_HISTORY_LIMIT }),
  historyDir: Type.Optional(Type.String({ minLength: 1 })),
  runOnStartup: Type.Boolean({ default: false }),
  llm: Type.Object({
    baseUrl: Type.String({ minLength: 1, default: "https://api.groq.com/openai/v1" }),
    apiKey: Type.Optional(Type.String({ minLength: 1 })),
    model: Type.String({ minLength: 1, default: DEFAULT_CHAT_MODEL }),
  }),
  news: Type.Object({
    apiKey: Type.Optional(Type.String({ minLength: 1 })),
    apiUrl: Type.Optional(Type.String({ minLength: 1 })),
    gnewsApiKey: Type.Optional(Type.String({ minLength: 1 })),
  }),
  evidence: Type.Object({
    minItems: Type.Integer({ minimum: 1, default: 5 }),
    ladderDays: Type.Array(Type.Integer({ minimum: 1 }), {
      minItems: 1,
      default: [...DEFAULT_LADDER_DAYS],
    }),
  }),
  minTradeConfidence: Type.Number({ minimum: 0, maximum: 1, default: 0.75 }),
});

export type AppConfig = Static<typeof AppConfigSchema>;

export class ConfigError extends Error {
  readonly kind = "config" as const;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Coercion
// ---------------------------------------------------------------------------

type Env = Record<string, string | undefined>;

function str(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/** Non-numeric text is kept as-is so the schema reports it. */
function num(env: Env, key: string): number | string | undefined {
  const value = str(env, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
}

function bool(env: Env, key: string): boolean | string | undefined {
  const value = str(env, key)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  if (value === "true" || value === "1" || value === "yes") return true;
  if (value === "false" || value === "0" || value === "no") return false;
  return value;
}

function list(env: Env, key: string): Array<number | string> | undefined {
  const value = str(env, key);
  if (value === undefined) {
    return undefined;
  }
  return value.split(",").map((part) => {
    const parsed = Number(part.trim());
    return Number.isNaN(parsed) ? part.trim() : parsed;
  });
}

function compact(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, v]) => v !== undefined));
}

// ---------------------------------------------------------------------------
// loadAppConfig
// ---------------------------------------------------------------------------

export function loadAppConfig(env: Env = process.env): AppConfig {
  const raw = compact({
    host: str(env, "HOST"),
    port: num(env, "PORT"),
    logLevel: str(env, "LOG_LEVEL")?.toLowerCase() ?? "info",
    graphPath: str(env, "GRAPH_PATH"),
    cacheTtlMs: num(env, "CACHE_TTL_MS"),
    unitTimeoutMs: num(env, "UNIT_TIMEOUT_MS"),
    historyLimit: num(env, "HISTORY_LIMIT"),
    historyDir: str(env, "HISTORY_DIR"),
    runOnStartup: bool(env, "RUN_ON_STARTUP"),
    llm: compact({
      baseUrl: str(env, "LLM_BASE_URL"),
      apiKey: str(env, "LLM_API_KEY"),
      model: str(env, "LLM_MODEL"),
    }),
    news: compact({
      apiKey: str(env, "NEWS_API_KEY"),
      apiUrl: str(env, "NEWS_API_URL"),
      gnewsApiKey: str(env, "GNEWS_API_KEY"),
    }),
    evidence: compact({
      minItems: num(env, "MIN_EVIDENCE_ITEMS"),
      ladderDays: list(env, "EVIDENCE_LADDER_DAYS"),
    }),
    minTradeConfidence: num(env, "MIN_TRADE_CONFIDENCE"),
  });

  const checked = checkValue(AppConfigSchema, raw);
  if (!checked.ok) {
    throw new ConfigError(checked.issues);
  }
  return checked.value;
}
