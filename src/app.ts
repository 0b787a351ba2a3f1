// ---------------------------------------------------------------------------
// Application wiring – config → collaborators → orchestrator → API server
// ---------------------------------------------------------------------------

import path from "node:path";
import type { AppConfig } from "./config/config.js";
import { ResultCache } from "./cache/result-cache.js";
import { ApiServer } from "./gateway/http-server.js";
import { orchestratorHandlers } from "./gateway/server-methods/orchestrator.js";
import { ChatClient, type ChatModel } from "./llm/chat-client.js";
import { createSubsystemLogger, formatError } from "./logging.js";
import { YahooChartProvider } from "./market/yahoo-provider.js";
import type { MarketDataProvider } from "./market/types.js";
import { loadGraphDescription } from "./orchestrator/graph-config.js";
import { OrchestratorService } from "./orchestrator/service.js";
import { UnitRegistry } from "./orchestrator/unit-registry.js";
import { registerNewsTools } from "./tools/news.js";
import { ToolRegistry } from "./tools/registry.js";
import {
  PaperBroker,
  registerBuiltinUnits,
  type Broker,
  type BuiltinUnitDeps,
} from "./units/builtin/index.js";

export const VERSION = "0.1.0";

export type AppOverrides = {
  market?: MarketDataProvider;
  tools?: ToolRegistry;
  broker?: Broker;
  chat?: ChatModel;
  fetchImpl?: typeof fetch;
  nowMs?: () => number;
};

export type App = {
  orchestrator: OrchestratorService<BuiltinUnitDeps>;
  server: ApiServer;
  start(): Promise<{ port: number }>;
  stop(): Promise<void>;
};

export async function createApp(config: AppConfig, overrides: AppOverrides = {}): Promise<App> {
  const log = createSubsystemLogger("app");

  const tools = overrides.tools ?? new ToolRegistry({ log: createSubsystemLogger("tools") });
  if (!overrides.tools) {
    registerNewsTools(tools, {
      newsApiKey: config.news.apiKey,
      newsApiUrl: config.news.apiUrl,
      gnewsApiKey: config.news.gnewsApiKey,
      fetchImpl: overrides.fetchImpl,
      nowMs: overrides.nowMs,
    });
  }

  let chat = overrides.chat;
  if (!chat && config.llm.apiKey) {
    chat = new ChatClient({
      baseUrl: config.llm.baseUrl,
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      fetchImpl: overrides.fetchImpl,
    });
  }
  if (!chat) {
    log.warn("no LLM_API_KEY configured; sentiment and strategy use their rule-based fallbacks");
  }

  const registry = new UnitRegistry<BuiltinUnitDeps>();
  registerBuiltinUnits(registry);

  const graphPath = path.resolve(config.graphPath);
  const graph = await loadGraphDescription(graphPath);
  log.info(`loaded graph ${graph.name} (${graph.nodes.length} nodes) from ${graphPath}`);

  const orchestrator = OrchestratorService.create({
    graph,
    registry,
    deps: {
      market: overrides.market ?? new YahooChartProvider({ fetchImpl: overrides.fetchImpl }),
      tools,
      broker: overrides.broker ?? new PaperBroker({ nowMs: overrides.nowMs }),
      chat,
      evidence: { minItems: config.evidence.minItems, ladderDays: config.evidence.ladderDays },
      minTradeConfidence: config.minTradeConfidence,
    },
    cache: new ResultCache({
      ttlMs: config.cacheTtlMs,
      nowMs: overrides.nowMs,
      log: createSubsystemLogger("cache"),
    }),
    unitTimeoutMs: config.unitTimeoutMs,
    historyLimit: config.historyLimit,
    historyDir: config.historyDir,
    log: createSubsystemLogger("orchestrator"),
    nowMs: overrides.nowMs,
  });

  const restored = await orchestrator.hydrate();
  if (restored > 0) {
    log.info(`restored ${restored} stored executions`);
  }

  const server = new ApiServer({
    host: config.host,
    port: config.port,
    handlers: orchestratorHandlers,
    context: { orchestrator, startedAtMs: Date.now(), version: VERSION },
    log: createSubsystemLogger("api"),
  });

  return {
    orchestrator,
    server,
    async start() {
      const started = await server.start();
      if (config.runOnStartup) {
        void orchestrator
          .run()
          .then((result) => log.info(`startup execution ${result.id} finished: ${result.status}`))
          .catch((err: unknown) => log.error(`startup execution failed: ${formatError(err)}`));
      }
      return started;
    },
    async stop() {
      await server.stop();
    },
  };
}
