// ---------------------------------------------------------------------------
// Sufficiency – Types
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";

// ===========================================================================
// SOURCES & SUBJECT
// ===========================================================================

export const SOURCE_TIERS = ["primary", "alternate", "supplementary"] as const;

export type SourceTier = (typeof SOURCE_TIERS)[number];

export type EvidenceSource = {
  /** Tool registry name. */
  tool: string;
  tier: SourceTier;
};

export type EvidenceSubject = {
  symbol: string;
  name?: string;
};

/** Lookback windows in days, narrowest first. */
export const DEFAULT_LADDER_DAYS: readonly number[] = [2, 90, 180];

// ===========================================================================
// EVIDENCE
// ===========================================================================

export const EvidenceItemSchema = Type.Object({
  title: Type.String({ minLength: 1 }),
  summary: Type.Optional(Type.String()),
  url: Type.Optional(Type.String()),
  /** ISO-8601 timestamp or date. */
  publishedAt: Type.Optional(Type.String()),
  publisher: Type.Optional(Type.String()),
});

export type EvidenceItem = Static<typeof EvidenceItemSchema>;

export type CollectedItem = EvidenceItem & {
  /** Tool that produced the item. */
  tool: string;
};

// ===========================================================================
// POLICY & VERDICTS
// ===========================================================================

export type SufficiencyPolicy = {
  minItems: number;
  /** Distinct tools that must have contributed at least one item. */
  minSources?: number;
  /** Distinct publication dates the evidence must span. */
  minDistinctDays?: number;
};

export type NextAction = "expand_timeframe" | "try_alternate_source" | "exhausted";

export type SufficiencyEvaluation = {
  sufficient: boolean;
  /** Unmet policy clauses (empty when the policy passes). */
  shortfalls: string[];
  action?: NextAction;
  /** Window the ladder would move to on `expand_timeframe`. */
  nextWindowDays?: number;
  /** Judge reasoning, when a judge was consulted. */
  judgeReasoning?: string;
  /** Tools the judge asked to try next. */
  preferredTools?: string[];
};

export type JudgeVerdict = {
  sufficient: boolean;
  reasoning: string;
  action?: "expand_timeframe" | "try_alternate_source";
  tools?: string[];
};

export type JudgeContext = {
  subject: EvidenceSubject;
  windowDays: number;
  itemCount: number;
  countsBySource: Record<string, number>;
  titles: string[];
  untriedTools: string[];
  signal?: AbortSignal;
};

/** Opaque reasoning step. Its answer is parsed by `parseJudgeVerdict`. */
export type SufficiencyJudge = (context: JudgeContext) => Promise<unknown>;

// ===========================================================================
// STATE
// ===========================================================================

export type SufficiencyPhase =
  | "init"
  | "selecting"
  | "fetching"
  | "evaluating"
  | "expanding"
  | "satisfied"
  | "exhausted";

export type RunningVerdict = "insufficient" | "sufficient" | "exhausted";

export type TraceEntry =
  | {
      type: "fetch";
      round: number;
      tool: string;
      days: number;
      newItems: number;
      totalItems: number;
      cached: boolean;
      error?: string;
    }
  | { type: "skip"; tool: string; days: number; reason: string }
  | {
      type: "evaluate";
      round: number;
      days: number;
      sufficient: boolean;
      action?: NextAction;
      shortfalls: string[];
      judgeReasoning?: string;
    }
  | { type: "expand"; fromDays: number; toDays: number };

export interface SufficiencyState {
  subject: EvidenceSubject;
  sources: EvidenceSource[];
  ladder: number[];
  /** Index into `ladder` of the current scope. */
  scopeIndex: number;
  /** Tools already selected in the current scope. */
  tried: Set<string>;
  items: CollectedItem[];
  itemsBySource: Record<string, CollectedItem[]>;
  seenTitles: Set<string>;
  /** Tools that completed a call, in first-call order. */
  sourcesUsed: string[];
  /** Completed fetches. */
  rounds: number;
  phase: SufficiencyPhase;
  verdict: RunningVerdict;
  trace: TraceEntry[];
}

export type EvidenceResult = {
  verdict: "satisfied" | "exhausted";
  /** Set when the policy was never met. */
  lowConfidence: boolean;
  items: CollectedItem[];
  itemsBySource: Record<string, CollectedItem[]>;
  sourcesUsed: string[];
  rounds: number;
  /** Lookback window in effect when the loop stopped. */
  windowDays: number;
  trace: TraceEntry[];
};
