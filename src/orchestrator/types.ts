// ---------------------------------------------------------------------------
// Orchestrator – Core Types
// ---------------------------------------------------------------------------
// Const arrays are the single source of truth. Types are derived from them
// so runtime validation and compile-time types stay in sync automatically.
// ---------------------------------------------------------------------------

// ===========================================================================
// GRAPH DESCRIPTION
// ===========================================================================

/**
 * Maps a consumer's input field to `"<producerId>"` (whole output) or
 * `"<producerId>.<field>"` (one field, dotted paths allowed).
 */
export type InputMapping = Record<string, string>;

export type UnitNode = {
  /** Unique within the graph; must not contain ".". */
  id: string;
  /** Key into the unit registry, e.g. "scouting". */
  unit: string;
  /** Static configuration handed to the unit factory. */
  config?: Record<string, unknown>;
  /** Absent or empty → root node, receives the initial input verbatim. */
  inputs?: InputMapping;
  /** Per-node override of the engine's unit timeout. */
  timeoutMs?: number;
  /** Set to false to bypass the result cache for this node. */
  cache?: boolean;
};

export type GraphDescription = {
  name: string;
  description?: string;
  nodes: UnitNode[];
};

// ===========================================================================
// EXECUTION PLAN
// ===========================================================================

export type ExecutionPlan = {
  /** Flattened topological order (wave by wave). */
  order: string[];
  /** Nodes grouped by wave; members of one wave may run concurrently. */
  waves: string[][];
  /** nodeId → producer ids it reads from, in declaration order. */
  dependencies: Record<string, string[]>;
};

// ===========================================================================
// EXECUTION RESULT
// ===========================================================================

export const UNIT_RUN_STATUSES = ["succeeded", "failed", "skipped"] as const;

export type UnitRunStatus = (typeof UNIT_RUN_STATUSES)[number];

export const EXECUTION_STATUSES = ["success", "partial", "failure"] as const;

export type ExecutionStatus = (typeof EXECUTION_STATUSES)[number];

export const UNIT_ERROR_KINDS = ["validation", "execution", "timeout", "routing"] as const;

export type UnitErrorKind = (typeof UNIT_ERROR_KINDS)[number];

export type UnitErrorDetail = {
  kind: UnitErrorKind;
  message: string;
  /** Every violated constraint, for validation failures. */
  issues?: string[];
};

export type UnitRunRecord = {
  unitId: string;
  /** Implementation reference the node was built from. */
  unit: string;
  wave: number;
  status: UnitRunStatus;
  output?: unknown;
  error?: UnitErrorDetail;
  /** True when the output was served from the result cache. */
  cacheHit?: boolean;
  /** Upstream ids that caused a skip. */
  skippedBecause?: string[];
  startedAtMs: number;
  completedAtMs: number;
  durationMs: number;
};

export type GraphErrorDetail = {
  kind: "graph";
  graphErrorKind: string;
  message: string;
  path?: string[];
};

export type ExecutionResult = {
  id: string;
  graphName: string;
  status: ExecutionStatus;
  order: string[];
  waves: string[][];
  /** One record per unit, in plan order. */
  units: UnitRunRecord[];
  /** unitId → output, for units that succeeded. */
  outputs: Record<string, unknown>;
  initialInput?: unknown;
  /** Present when the graph could not be resolved. */
  error?: GraphErrorDetail;
  startedAtMs: number;
  completedAtMs: number;
  durationMs: number;
};
