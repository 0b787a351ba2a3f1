// ---------------------------------------------------------------------------
// Sufficiency – Adaptive Collection Loop
// ---------------------------------------------------------------------------
// init → selecting → fetching → evaluating → {expanding | satisfied | exhausted}
//
// Each source is tried at most once per scope; the ladder is finite, so the
// loop performs at most `ladder.length × sources.length` fetches. The cap is
// also checked explicitly before every fetch.
// ---------------------------------------------------------------------------

import { Value } from "@sinclair/typebox/value";
import type { ResultCache } from "../cache/result-cache.js";
import { generateCacheKey } from "../cache/result-cache.js";
import { formatError, silentLogger, type SubsystemLogger } from "../logging.js";
import { isRecord } from "../llm/json.js";
import { ToolError, type ToolRegistry } from "../tools/registry.js";
import { parseJudgeVerdict } from "./judge.js";
import {
  canExpand,
  createSufficiencyState,
  currentWindowDays,
  evaluateSufficiency,
  mergeEvidence,
  untriedSources,
} from "./policy.js";
import type {
  EvidenceItem,
  EvidenceResult,
  EvidenceSource,
  EvidenceSubject,
  SufficiencyEvaluation,
  SufficiencyJudge,
  SufficiencyPolicy,
  SufficiencyState,
} from "./types.js";
import { EvidenceItemSchema } from "./types.js";

export interface CollectEvidenceOpts {
  subject: EvidenceSubject;
  sources: EvidenceSource[];
  policy: SufficiencyPolicy;
  tools: ToolRegistry;
  ladder?: readonly number[];
  judge?: SufficiencyJudge;
  /** Per-fetch memoization at (tool, subject, window) granularity. */
  cache?: ResultCache;
  maxResults?: number;
  signal?: AbortSignal;
  log?: SubsystemLogger;
}

export const DEFAULT_MAX_RESULTS = 20;

// ---------------------------------------------------------------------------
// Fetching
// ---------------------------------------------------------------------------

/** Keep the entries of a tool result that look like evidence items. */
export function normalizeToolItems(result: unknown): EvidenceItem[] {
  const list: unknown = Array.isArray(result)
    ? result
    : isRecord(result) && Array.isArray(result.items)
      ? result.items
      : [];
  if (!Array.isArray(list)) {
    return [];
  }
  const items: EvidenceItem[] = [];
  for (const entry of list) {
    if (Value.Check(EvidenceItemSchema, entry)) {
      items.push(entry);
    }
  }
  return items;
}

async function fetchFromSource(
  opts: CollectEvidenceOpts,
  tool: string,
  days: number,
): Promise<{ items: EvidenceItem[]; cached: boolean }> {
  const maxResults = opts.maxResults ?? DEFAULT_MAX_RESULTS;
  const key = generateCacheKey(`tool:${tool}`, {
    subject: opts.subject,
    days,
    maxResults,
  });

  if (opts.cache) {
    const hit = await opts.cache.get(key);
    if (hit !== undefined) {
      return { items: normalizeToolItems(hit), cached: true };
    }
  }

  const raw = await opts.tools.call(
    tool,
    {
      symbol: opts.subject.symbol,
      query: opts.subject.name ?? opts.subject.symbol,
      days,
      maxResults,
    },
    { signal: opts.signal },
  );
  const items = normalizeToolItems(raw);
  await opts.cache?.set(key, items);
  return { items, cached: false };
}

// ---------------------------------------------------------------------------
// Evaluating
// ---------------------------------------------------------------------------

async function evaluate(
  state: SufficiencyState,
  opts: CollectEvidenceOpts,
  log: SubsystemLogger,
): Promise<SufficiencyEvaluation> {
  const evaluation = evaluateSufficiency(state, opts.policy);
  if (!evaluation.sufficient || !opts.judge) {
    return evaluation;
  }

  let raw: unknown;
  try {
    raw = await opts.judge({
      subject: state.subject,
      windowDays: currentWindowDays(state),
      itemCount: state.items.length,
      countsBySource: Object.fromEntries(
        Object.entries(state.itemsBySource).map(([tool, list]) => [tool, list.length]),
      ),
      titles: state.items.map((i) => i.title),
      untriedTools: untriedSources(state).map((s) => s.tool),
      signal: opts.signal,
    });
  } catch (err) {
    log.warn(`sufficiency judge failed for ${state.subject.symbol}: ${formatError(err)}`);
    raw = undefined;
  }

  const verdict = parseJudgeVerdict(raw);
  if (verdict.sufficient) {
    return { ...evaluation, judgeReasoning: verdict.reasoning };
  }

  // Judge veto: fall back to the policy's own escalation order, honoring the
  // judge's preference where it is still possible.
  const remaining = untriedSources(state).length > 0;
  let action = evaluation.action;
  if (verdict.action === "expand_timeframe" && canExpand(state)) {
    action = "expand_timeframe";
  } else if (remaining) {
    action = "try_alternate_source";
  } else if (canExpand(state)) {
    action = "expand_timeframe";
  } else {
    action = "exhausted";
  }
  return {
    sufficient: false,
    shortfalls: [`judge: ${verdict.reasoning || "insufficient"}`],
    action,
    nextWindowDays: action === "expand_timeframe" ? state.ladder[state.scopeIndex + 1] : undefined,
    judgeReasoning: verdict.reasoning,
    preferredTools: verdict.tools,
  };
}

// ---------------------------------------------------------------------------
// Selecting & expanding
// ---------------------------------------------------------------------------

function selectNextSource(
  state: SufficiencyState,
  preferred: readonly string[],
): EvidenceSource | undefined {
  const candidates = untriedSources(state);
  for (const name of preferred) {
    const match = candidates.find((s) => s.tool === name);
    if (match) {
      return match;
    }
  }
  return candidates[0];
}

function expand(state: SufficiencyState, log: SubsystemLogger): void {
  const fromDays = currentWindowDays(state);
  state.phase = "expanding";
  state.scopeIndex++;
  state.tried.clear();
  const toDays = currentWindowDays(state);
  state.trace.push({ type: "expand", fromDays, toDays });
  log.info(`expanding window for ${state.subject.symbol}: ${fromDays}d -> ${toDays}d`);
}

function finish(state: SufficiencyState, verdict: "satisfied" | "exhausted"): EvidenceResult {
  state.phase = verdict;
  state.verdict = verdict === "satisfied" ? "sufficient" : "exhausted";
  return {
    verdict,
    lowConfidence: verdict === "exhausted",
    items: state.items,
    itemsBySource: state.itemsBySource,
    sourcesUsed: state.sourcesUsed,
    rounds: state.rounds,
    windowDays: currentWindowDays(state),
    trace: state.trace,
  };
}

// ---------------------------------------------------------------------------
// collectEvidence
// ---------------------------------------------------------------------------

export async function collectEvidence(opts: CollectEvidenceOpts): Promise<EvidenceResult> {
  const log = opts.log ?? silentLogger;
  const state = createSufficiencyState({
    subject: opts.subject,
    sources: opts.sources,
    ladder: opts.ladder,
  });
  const maxRounds = state.ladder.length * state.sources.length;
  let preferred: readonly string[] = [];

  for (;;) {
    opts.signal?.throwIfAborted();

    state.phase = "selecting";
    const source = selectNextSource(state, preferred);
    if (!source) {
      if (canExpand(state)) {
        expand(state, log);
        continue;
      }
      return finish(state, "exhausted");
    }
    state.tried.add(source.tool);
    const days = currentWindowDays(state);

    if (!opts.tools.isAvailable(source.tool)) {
      const reason = opts.tools.has(source.tool) ? "not available" : "not registered";
      log.warn(`skipping ${source.tool} for ${state.subject.symbol}: ${reason}`);
      state.trace.push({ type: "skip", tool: source.tool, days, reason });
      continue;
    }

    if (state.rounds >= maxRounds) {
      return finish(state, "exhausted");
    }

    // -- fetching --
    state.phase = "fetching";
    state.rounds++;
    let newItems = 0;
    let cached = false;
    let error: string | undefined;
    try {
      const fetched = await fetchFromSource(opts, source.tool, days);
      cached = fetched.cached;
      newItems = mergeEvidence(state, source.tool, fetched.items);
      if (!state.sourcesUsed.includes(source.tool)) {
        state.sourcesUsed.push(source.tool);
      }
    } catch (err) {
      if (!(err instanceof ToolError)) {
        throw err;
      }
      error = err.message;
      log.warn(`${source.tool} failed for ${state.subject.symbol}: ${err.message}`);
    }
    state.trace.push({
      type: "fetch",
      round: state.rounds,
      tool: source.tool,
      days,
      newItems,
      totalItems: state.items.length,
      cached,
      ...(error ? { error } : {}),
    });

    // -- evaluating --
    state.phase = "evaluating";
    const evaluation = await evaluate(state, opts, log);
    state.trace.push({
      type: "evaluate",
      round: state.rounds,
      days,
      sufficient: evaluation.sufficient,
      action: evaluation.action,
      shortfalls: evaluation.shortfalls,
      ...(evaluation.judgeReasoning !== undefined
        ? { judgeReasoning: evaluation.judgeReasoning }
        : {}),
    });

    if (evaluation.sufficient) {
      return finish(state, "satisfied");
    }
    preferred = evaluation.preferredTools ?? [];
    if (evaluation.action === "exhausted") {
      return finish(state, "exhausted");
    }
    if (evaluation.action === "expand_timeframe") {
      expand(state, log);
    }
  }
}
