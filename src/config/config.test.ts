import { describe, expect, it } from "vitest";
import { ConfigError, loadAppConfig } from "./config.js";

describe("loadAppConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadAppConfig({})).toEqual({
      host: "0.0.0.0",
      port: 8000,
      logLevel: "info",
      graphPath: "config/graph.yaml",
      cacheTtlMs: 3 * 60 * 60 * 1000,
      unitTimeoutMs: 0,
      historyLimit: 100,
      runOnStartup: false,
      llm: { baseUrl: "https://api.groq.com/openai/v1", model: "qwen/qwen3-32b" },
      news: {},
      evidence: { minItems: 5, ladderDays: [2, 90, 180] },
      minTradeConfidence: 0.75,
    });
  });

  it("coerces numbers, booleans and lists", () => {
    const config = loadAppConfig({
      PORT: "9000",
      LOG_LEVEL: "DEBUG",
      RUN_ON_STARTUP: "true",
      HISTORY_DIR: "/tmp/history",
      EVIDENCE_LADDER_DAYS: "3, 30",
      MIN_EVIDENCE_ITEMS: "8",
      LLM_API_KEY: "test-secret",
      NEWS_API_KEY: "test-secret",
      MIN_TRADE_CONFIDENCE: "0.8",
    });
    expect(config.port).toBe(9000);
    expect(config.logLevel).toBe("debug");
    expect(config.runOnStartup).toBe(true);
    expect(config.historyDir).toBe("/tmp/history");
    expect(config.evidence).toEqual({ minItems: 8, ladderDays: [3, 30] });
    expect(config.llm.apiKey).toBe("test-secret");
    expect(config.news.apiKey).toBe("test-secret");
    expect(config.minTradeConfidence).toBe(0.8);
  });

  it("treats blank values as unset", () => {
    expect(loadAppConfig({ PORT: "  ", LLM_API_KEY: "" }).port).toBe(8000);
  });

  it("reports every invalid variable", () => {
    try {
      loadAppConfig({ PORT: "abc", LOG_LEVEL: "loud", MIN_TRADE_CONFIDENCE: "2" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect([...new Set(err.issues.map((i) => i.split(":")[0]))]).toEqual([
          "/port",
          "/logLevel",
          "/minTradeConfidence",
        ]);
      }
    }
  });

  it("rejects a malformed ladder", () => {
    expect(() => loadAppConfig({ EVIDENCE_LADDER_DAYS: "2,soon" })).toThrow(ConfigError);
  });
});
