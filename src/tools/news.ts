// ---------------------------------------------------------------------------
// News Tools – evidence sources for the sentiment unit
// ---------------------------------------------------------------------------
// Every tool takes the same parameters and resolves to `EvidenceItem[]`.
// A tool whose API key is missing is still registered, marked unavailable,
// so the collection loop can record it as skipped.
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { EvidenceItem } from "../sufficiency/types.js";
import type { ToolCallContext, ToolDescriptor, ToolRegistry } from "./registry.js";

export const NewsQuerySchema = Type.Object({
  symbol: Type.String({ minLength: 1 }),
  /** Company name or free-text search phrase. */
  query: Type.String({ minLength: 1 }),
  days: Type.Integer({ minimum: 1, default: 2 }),
  maxResults: Type.Integer({ minimum: 1, maximum: 100, default: 20 }),
});

export type NewsQuery = Static<typeof NewsQuerySchema>;

export type NewsTool = ToolDescriptor<typeof NewsQuerySchema, EvidenceItem[]>;

export const NEWS_TOOL_NAMES = {
  eventRegistry: "fetch_news",
  gnews: "fetch_gnews",
  reddit: "fetch_reddit_mentions",
  twitter: "fetch_twitter_mentions",
} as const;

type HttpOpts = {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  nowMs?: () => number;
};

const DAY_MS = 24 * 60 * 60 * 1000;

function isoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

async function requestJson(
  url: string,
  init: RequestInit,
  opts: HttpOpts,
  ctx: ToolCallContext,
): Promise<unknown> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const timeout = AbortSignal.timeout(opts.timeoutMs ?? 30_000);
  const signal = ctx.signal ? AbortSignal.any([ctx.signal, timeout]) : timeout;
  const res = await fetchImpl(url, { ...init, signal });
  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new Error(`HTTP ${res.status}${text ? `: ${text.slice(0, 200)}` : ""}`);
  }
  return res.json();
}

function truncate(text: string | undefined, max: number): string | undefined {
  if (!text) {
    return undefined;
  }
  return text.length > max ? text.slice(0, max) : text;
}

// ---------------------------------------------------------------------------
// Event Registry
// ---------------------------------------------------------------------------

const EventRegistryResponseSchema = Type.Object({
  articles: Type.Optional(
    Type.Object({
      results: Type.Array(
        Type.Object({
          title: Type.Optional(Type.String()),
          body: Type.Optional(Type.String()),
          url: Type.Optional(Type.String()),
          dateTimePub: Type.Optional(Type.String()),
          source: Type.Optional(Type.Object({ title: Type.Optional(Type.String()) })),
        }),
      ),
    }),
  ),
});

export const DEFAULT_EVENT_REGISTRY_URL = "https://eventregistry.org/api/v1/article/getArticles";

export function createEventRegistryTool(
  opts: HttpOpts & { apiKey?: string; apiUrl?: string; sourceLocationUri?: string },
): NewsTool {
  const now = opts.nowMs ?? Date.now;
  return {
    name: NEWS_TOOL_NAMES.eventRegistry,
    description: "Recent news articles from Event Registry, newest first.",
    parameters: NewsQuerySchema,
    available: Boolean(opts.apiKey),
    async execute(args, ctx) {
      const end = now();
      const body = await requestJson(
        opts.apiUrl ?? DEFAULT_EVENT_REGISTRY_URL,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            action: "getArticles",
            keyword: args.query,
            sourceLocationUri: [opts.sourceLocationUri ?? "http://en.wikipedia.org/wiki/India"],
            ignoreSourceGroupUri: "paywall/paywalled_sources",
            articlesPage: 1,
            articlesCount: args.maxResults,
            articlesSortBy: "date",
            articlesSortByAsc: false,
            dataType: ["news", "pr"],
            forceMaxDataTimeWindow: args.days,
            resultType: "articles",
            apiKey: opts.apiKey,
            dateStart: isoDate(end - args.days * DAY_MS),
            dateEnd: isoDate(end),
            includeArticleTitle: true,
            includeArticleBody: true,
            includeSourceTitle: true,
          }),
        },
        opts,
        ctx,
      );
      if (!Value.Check(EventRegistryResponseSchema, body)) {
        throw new Error("Unexpected Event Registry response");
      }
      return (body.articles?.results ?? []).flatMap((a) =>
        a.title
          ? [
              {
                title: a.title,
                summary: truncate(a.body, 500),
                url: a.url,
                publishedAt: a.dateTimePub,
                publisher: a.source?.title,
              },
            ]
          : [],
      );
    },
  };
}

// ---------------------------------------------------------------------------
// GNews
// ---------------------------------------------------------------------------

const GNewsResponseSchema = Type.Object({
  articles: Type.Array(
    Type.Object({
      title: Type.String(),
      description: Type.Optional(Type.Union([Type.String(), Type.Null()])),
      url: Type.Optional(Type.String()),
      publishedAt: Type.Optional(Type.String()),
      source: Type.Optional(Type.Object({ name: Type.Optional(Type.String()) })),
    }),
  ),
});

export function createGNewsTool(opts: HttpOpts & { apiKey?: string }): NewsTool {
  const now = opts.nowMs ?? Date.now;
  return {
    name: NEWS_TOOL_NAMES.gnews,
    description: "News search through GNews, used when the primary feed is thin.",
    parameters: NewsQuerySchema,
    available: Boolean(opts.apiKey),
    async execute(args, ctx) {
      const params = new URLSearchParams({
        q: `${args.query} ${args.symbol}`,
        token: opts.apiKey ?? "",
        lang: "en",
        max: String(args.maxResults),
        from: new Date(now() - args.days * DAY_MS).toISOString().replace(/\.\d{3}Z$/, "Z"),
        sortby: "publishedAt",
      });
      const body = await requestJson(`https://gnews.io/api/v4/search?${params}`, {}, opts, ctx);
      if (!Value.Check(GNewsResponseSchema, body)) {
        throw new Error("Unexpected GNews response");
      }
      return body.articles.map((a) => ({
        title: a.title,
        summary: a.description ?? undefined,
        url: a.url,
        publishedAt: a.publishedAt,
        publisher: a.source?.name ?? "GNews",
      }));
    },
  };
}

// ---------------------------------------------------------------------------
// Reddit
// ---------------------------------------------------------------------------

export const DEFAULT_SUBREDDITS = ["stocks", "investing", "StockMarket", "IndianStockMarket"];

const RedditResponseSchema = Type.Object({
  data: Type.Object({
    children: Type.Array(
      Type.Object({
        data: Type.Object({
          title: Type.String(),
          selftext: Type.Optional(Type.String()),
          permalink: Type.Optional(Type.String()),
          created_utc: Type.Optional(Type.Number()),
          subreddit: Type.Optional(Type.String()),
        }),
      }),
    ),
  }),
});

export function createRedditTool(opts: HttpOpts & { subreddits?: string[] }): NewsTool {
  const subreddits = opts.subreddits ?? DEFAULT_SUBREDDITS;
  const now = opts.nowMs ?? Date.now;
  return {
    name: NEWS_TOOL_NAMES.reddit,
    description: "Recent posts mentioning the company in investing subreddits.",
    parameters: NewsQuerySchema,
    async execute(args, ctx) {
      const cutoffSec = (now() - args.days * DAY_MS) / 1000;
      const perSubreddit = Math.max(1, Math.min(25, Math.floor(args.maxResults / subreddits.length)));
      const items: EvidenceItem[] = [];
      for (const subreddit of subreddits) {
        const params = new URLSearchParams({
          q: `${args.query} OR ${args.symbol}`,
          restrict_sr: "true",
          limit: String(perSubreddit),
          sort: "relevance",
          t: args.days <= 30 ? "month" : "year",
        });
        const body = await requestJson(
          `https://www.reddit.com/r/${subreddit}/search.json?${params}`,
          { headers: { "User-Agent": "trade-graph/1.0" } },
          opts,
          ctx,
        );
        if (!Value.Check(RedditResponseSchema, body)) {
          throw new Error(`Unexpected Reddit response for r/${subreddit}`);
        }
        for (const { data: post } of body.data.children) {
          if (post.created_utc !== undefined && post.created_utc < cutoffSec) {
            continue;
          }
          items.push({
            title: post.title,
            summary: truncate(post.selftext, 500),
            url: post.permalink ? `https://reddit.com${post.permalink}` : undefined,
            publishedAt:
              post.created_utc !== undefined ? new Date(post.created_utc * 1000).toISOString() : undefined,
            publisher: `r/${post.subreddit ?? subreddit}`,
          });
        }
      }
      return items.slice(0, args.maxResults);
    },
  };
}

// ---------------------------------------------------------------------------
// Twitter (registered, not implemented)
// ---------------------------------------------------------------------------

export function createTwitterTool(): NewsTool {
  return {
    name: NEWS_TOOL_NAMES.twitter,
    description: "Social mentions on X/Twitter. Not available without API access.",
    parameters: NewsQuerySchema,
    available: false,
    async execute() {
      return [];
    },
  };
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export type NewsToolsOpts = HttpOpts & {
  newsApiKey?: string;
  newsApiUrl?: string;
  gnewsApiKey?: string;
};

export function registerNewsTools(registry: ToolRegistry, opts: NewsToolsOpts): void {
  const http: HttpOpts = { fetchImpl: opts.fetchImpl, timeoutMs: opts.timeoutMs, nowMs: opts.nowMs };
  registry.register(createEventRegistryTool({ ...http, apiKey: opts.newsApiKey, apiUrl: opts.newsApiUrl }));
  registry.register(createGNewsTool({ ...http, apiKey: opts.gnewsApiKey }));
  registry.register(createRedditTool(http));
  registry.register(createTwitterTool());
}
