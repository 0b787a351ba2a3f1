// ---------------------------------------------------------------------------
// Sufficiency – State & Policy
// ---------------------------------------------------------------------------
// Pure helpers over `SufficiencyState`: seeding, evidence merging and the
// policy check that produces the next recommended action.
// ---------------------------------------------------------------------------

import type {
  CollectedItem,
  EvidenceItem,
  EvidenceSource,
  EvidenceSubject,
  SufficiencyEvaluation,
  SufficiencyPolicy,
  SufficiencyState,
} from "./types.js";
import { DEFAULT_LADDER_DAYS, SOURCE_TIERS } from "./types.js";

// ---------------------------------------------------------------------------
// createSufficiencyState
// ---------------------------------------------------------------------------

/**
 * Seed a state at the narrowest scope. Sources are ordered by tier (primary,
 * alternate, supplementary), declaration order within a tier.
 */
export function createSufficiencyState(params: {
  subject: EvidenceSubject;
  sources: EvidenceSource[];
  ladder?: readonly number[];
}): SufficiencyState {
  const ladder = [...(params.ladder ?? DEFAULT_LADDER_DAYS)];
  if (ladder.length === 0) {
    throw new Error("Escalation ladder must contain at least one window");
  }
  const sources = params.sources
    .map((source, index) => ({ source, index }))
    .sort(
      (a, b) =>
        SOURCE_TIERS.indexOf(a.source.tier) - SOURCE_TIERS.indexOf(b.source.tier) ||
        a.index - b.index,
    )
    .map(({ source }) => source);

  return {
    subject: params.subject,
    sources,
    ladder,
    scopeIndex: 0,
    tried: new Set(),
    items: [],
    itemsBySource: {},
    seenTitles: new Set(),
    sourcesUsed: [],
    rounds: 0,
    phase: "init",
    verdict: "insufficient",
    trace: [],
  };
}

export function currentWindowDays(state: SufficiencyState): number {
  return state.ladder[state.scopeIndex] ?? state.ladder[state.ladder.length - 1] ?? 0;
}

export function canExpand(state: SufficiencyState): boolean {
  return state.scopeIndex < state.ladder.length - 1;
}

export function untriedSources(state: SufficiencyState): EvidenceSource[] {
  return state.sources.filter((s) => !state.tried.has(s.tool));
}

// ---------------------------------------------------------------------------
// mergeEvidence
// ---------------------------------------------------------------------------

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, " ");
}

/** Append unseen items tagged with `tool`. Returns how many were new. */
export function mergeEvidence(
  state: SufficiencyState,
  tool: string,
  items: EvidenceItem[],
): number {
  let added = 0;
  for (const item of items) {
    const key = normalizeTitle(item.title);
    if (key.length === 0 || state.seenTitles.has(key)) {
      continue;
    }
    state.seenTitles.add(key);
    const collected: CollectedItem = { ...item, tool };
    state.items.push(collected);
    (state.itemsBySource[tool] ??= []).push(collected);
    added++;
  }
  return added;
}

function distinctDays(items: CollectedItem[]): number {
  const days = new Set<string>();
  for (const item of items) {
    if (!item.publishedAt) {
      continue;
    }
    const parsed = Date.parse(item.publishedAt);
    if (!Number.isNaN(parsed)) {
      days.add(new Date(parsed).toISOString().slice(0, 10));
    }
  }
  return days.size;
}

// ---------------------------------------------------------------------------
// evaluateSufficiency
// ---------------------------------------------------------------------------

/**
 * Apply `policy` to the accumulated evidence. When insufficient, recommend
 * another source in the current scope, then a wider window, then give up.
 */
export function evaluateSufficiency(
  state: SufficiencyState,
  policy: SufficiencyPolicy,
): SufficiencyEvaluation {
  const shortfalls: string[] = [];

  if (state.items.length < policy.minItems) {
    shortfalls.push(`items ${state.items.length} < ${policy.minItems}`);
  }
  if (policy.minSources !== undefined) {
    const contributing = Object.values(state.itemsBySource).filter((l) => l.length > 0).length;
    if (contributing < policy.minSources) {
      shortfalls.push(`sources ${contributing} < ${policy.minSources}`);
    }
  }
  if (policy.minDistinctDays !== undefined) {
    const days = distinctDays(state.items);
    if (days < policy.minDistinctDays) {
      shortfalls.push(`distinct days ${days} < ${policy.minDistinctDays}`);
    }
  }

  if (shortfalls.length === 0) {
    return { sufficient: true, shortfalls };
  }
  if (untriedSources(state).length > 0) {
    return { sufficient: false, shortfalls, action: "try_alternate_source" };
  }
  if (canExpand(state)) {
    return {
      sufficient: false,
      shortfalls,
      action: "expand_timeframe",
      nextWindowDays: state.ladder[state.scopeIndex + 1],
    };
  }
  return { sufficient: false, shortfalls, action: "exhausted" };
}
