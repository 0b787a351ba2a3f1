// ---------------------------------------------------------------------------
// Orchestrator – Wave-Parallel Graph Executor
// ---------------------------------------------------------------------------
// Resolves the graph into waves, runs each wave's units concurrently and
// commits their records only after the whole wave settled. Units downstream
// of a failure are skipped through the input router. Events are streamed via
// the `onEvent` callback.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import { generateCacheKey, ResultCache } from "../cache/result-cache.js";
import { formatError, silentLogger, type SubsystemLogger } from "../logging.js";
import type { AnyUnit, UnitOutcome } from "../units/unit.js";
import { UnitTimeoutError } from "../units/unit.js";
import { GraphError, GraphResolver } from "./resolver.js";
import { RoutingError, routeInput } from "./router.js";
import type {
  ExecutionPlan,
  ExecutionResult,
  ExecutionStatus,
  GraphDescription,
  UnitNode,
  UnitRunRecord,
} from "./types.js";

// ---------------------------------------------------------------------------
// Run event types
// ---------------------------------------------------------------------------

export type RunEventType =
  | "unit_started"
  | "unit_completed"
  | "unit_failed"
  | "unit_skipped"
  | "run_completed";

export interface RunEvent {
  type: RunEventType;
  executionId: string;
  graphName: string;
  unitId?: string;
  timestamp: number;
  output?: unknown;
  error?: string;
  reason?: string;
  cacheHit?: boolean;
  durationMs?: number;
  status?: ExecutionStatus;
  totalDurationMs?: number;
}

export type RunEventCallback = (event: RunEvent) => void;

export interface ExecuteGraphOpts {
  graph: GraphDescription;
  /** nodeId → instantiated unit. */
  units: ReadonlyMap<string, AnyUnit>;
  initialInput?: unknown;
  /** Shared across runs for memoization; a private cache is used when absent. */
  cache?: ResultCache;
  /** Default per-unit timeout; `0` or absent disables it. */
  unitTimeoutMs?: number;
  executionId?: string;
  onEvent?: RunEventCallback;
  log?: SubsystemLogger;
  nowMs?: () => number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** `success` when all succeeded (or nothing ran), `failure` when none did. */
export function summarizeStatus(records: readonly UnitRunRecord[]): ExecutionStatus {
  const succeeded = records.filter((r) => r.status === "succeeded").length;
  if (succeeded === records.length) {
    return "success";
  }
  return succeeded === 0 ? "failure" : "partial";
}

export function unitCacheKey(node: UnitNode, input: unknown): string {
  return generateCacheKey(`unit:${node.id}`, {
    unit: node.unit,
    config: node.config ?? {},
    input,
  });
}

async function invokeWithTimeout(
  node: UnitNode,
  unit: AnyUnit,
  input: unknown,
  ctx: { executionId: string; cache: ResultCache; log: SubsystemLogger },
  timeoutMs: number | undefined,
): Promise<UnitOutcome> {
  const controller = new AbortController();
  const runCtx = { ...ctx, signal: controller.signal };
  if (!timeoutMs || timeoutMs <= 0) {
    return unit.execute(input, runCtx);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<UnitOutcome>((resolve) => {
    timer = setTimeout(() => {
      const err = new UnitTimeoutError(node.id, timeoutMs);
      controller.abort(err);
      resolve({ status: "failed", errorKind: "timeout", message: err.message });
    }, timeoutMs);
  });
  try {
    return await Promise.race([unit.execute(input, runCtx), timedOut]);
  } finally {
    clearTimeout(timer);
  }
}

/** Execution record for a graph rejected before any unit ran. */
export function graphFailureResult(params: {
  id: string;
  graphName: string;
  initialInput?: unknown;
  startedAtMs: number;
  completedAtMs: number;
  error: GraphError;
}): ExecutionResult {
  const { error, ...rest } = params;
  return {
    ...rest,
    status: "failure",
    order: [],
    waves: [],
    units: [],
    outputs: {},
    error: {
      kind: "graph",
      graphErrorKind: error.kind,
      message: error.message,
      ...(error.path ? { path: error.path } : {}),
    },
    durationMs: params.completedAtMs - params.startedAtMs,
  };
}

// ---------------------------------------------------------------------------
// executeGraph
// ---------------------------------------------------------------------------

/**
 * Execute a graph wave by wave.
 *
 * - Never throws: resolution problems produce a `failure` result carrying
 *   `error.kind = "graph"` before any unit runs.
 * - A unit whose producers did not all succeed is recorded `skipped`.
 * - Cache hits short-circuit `execute` and are flagged on the record.
 */
export async function executeGraph(opts: ExecuteGraphOpts): Promise<ExecutionResult> {
  const now = opts.nowMs ?? Date.now;
  const log = opts.log ?? silentLogger;
  const cache = opts.cache ?? new ResultCache({ nowMs: opts.nowMs });
  const executionId = opts.executionId ?? randomUUID();
  const graphName = opts.graph.name;
  const startedAtMs = now();

  const emit = (event: Omit<RunEvent, "executionId" | "graphName" | "timestamp">) => {
    if (!opts.onEvent) {
      return;
    }
    try {
      opts.onEvent({ ...event, executionId, graphName, timestamp: now() });
    } catch (err) {
      log.warn(`run event listener failed: ${formatError(err)}`);
    }
  };

  const base = { id: executionId, graphName, initialInput: opts.initialInput, startedAtMs };

  // -- resolve --
  let plan: ExecutionPlan;
  try {
    plan = GraphResolver.resolve(opts.graph.nodes);
    for (const node of opts.graph.nodes) {
      if (!opts.units.has(node.id)) {
        throw new GraphError("unknownUnit", `No unit instance for node "${node.id}" (${node.unit})`, {
          nodeId: node.id,
        });
      }
    }
  } catch (err) {
    if (!(err instanceof GraphError)) {
      throw err;
    }
    log.error(`graph ${graphName} rejected: ${err.message}`);
    const result = graphFailureResult({ ...base, completedAtMs: now(), error: err });
    emit({
      type: "run_completed",
      status: "failure",
      error: err.message,
      totalDurationMs: result.durationMs,
    });
    return result;
  }

  const nodeMap = new Map(opts.graph.nodes.map((n) => [n.id, n]));
  const records = new Map<string, UnitRunRecord>();

  // -- run one node --
  const runNode = async (node: UnitNode, wave: number): Promise<UnitRunRecord> => {
    const unitStartedAtMs = now();
    const finish = (
      fields: Omit<UnitRunRecord, "unitId" | "unit" | "wave" | "startedAtMs" | "completedAtMs" | "durationMs">,
    ): UnitRunRecord => {
      const completedAtMs = now();
      return {
        unitId: node.id,
        unit: node.unit,
        wave,
        ...fields,
        startedAtMs: unitStartedAtMs,
        completedAtMs,
        durationMs: completedAtMs - unitStartedAtMs,
      };
    };

    let input: unknown;
    try {
      input = routeInput(node, records, opts.initialInput);
    } catch (err) {
      if (!(err instanceof RoutingError)) {
        throw err;
      }
      emit({ type: "unit_skipped", unitId: node.id, reason: err.message });
      log.info(`skipping ${node.id}: ${err.message}`);
      return finish({
        status: "skipped",
        error: { kind: "routing", message: err.message },
        skippedBecause: err.producers,
      });
    }

    emit({ type: "unit_started", unitId: node.id });
    let key: string | undefined;
    if (node.cache !== false) {
      try {
        key = unitCacheKey(node, input);
      } catch (err) {
        log.warn(`not caching ${node.id}: ${formatError(err)}`);
      }
    }

    if (key !== undefined) {
      const hit = await cache.get(key);
      if (hit !== undefined) {
        const record = finish({ status: "succeeded", output: hit, cacheHit: true });
        emit({
          type: "unit_completed",
          unitId: node.id,
          output: hit,
          cacheHit: true,
          durationMs: record.durationMs,
        });
        return record;
      }
    }

    const unit = opts.units.get(node.id);
    if (!unit) {
      // Checked before the first wave.
      throw new Error(`No unit instance for node "${node.id}"`);
    }
    const outcome = await invokeWithTimeout(
      node,
      unit,
      input,
      { executionId, cache, log },
      node.timeoutMs ?? opts.unitTimeoutMs,
    );

    if (outcome.status === "succeeded") {
      if (key !== undefined) {
        await cache.set(key, outcome.output);
      }
      const record = finish({ status: "succeeded", output: outcome.output, cacheHit: false });
      emit({
        type: "unit_completed",
        unitId: node.id,
        output: outcome.output,
        cacheHit: false,
        durationMs: record.durationMs,
      });
      return record;
    }

    log.warn(`unit ${node.id} failed (${outcome.errorKind}): ${outcome.message}`);
    const record = finish({
      status: "failed",
      error: {
        kind: outcome.errorKind,
        message: outcome.message,
        ...(outcome.issues ? { issues: outcome.issues } : {}),
      },
    });
    emit({
      type: "unit_failed",
      unitId: node.id,
      error: outcome.message,
      durationMs: record.durationMs,
    });
    return record;
  };

  // -- per-node boundary: anything unexpected becomes a failed record --
  const runNodeSafely = async (id: string, wave: number): Promise<UnitRunRecord> => {
    const startedAt = now();
    const node = nodeMap.get(id);
    try {
      if (!node) {
        throw new Error(`Plan references missing node "${id}"`);
      }
      return await runNode(node, wave);
    } catch (err) {
      const message = formatError(err);
      log.error(`unit ${id} crashed: ${message}`);
      emit({ type: "unit_failed", unitId: id, error: message });
      const completedAtMs = now();
      return {
        unitId: id,
        unit: node?.unit ?? "",
        wave,
        status: "failed",
        error: { kind: "execution", message },
        startedAtMs: startedAt,
        completedAtMs,
        durationMs: completedAtMs - startedAt,
      };
    }
  };

  // -- waves --
  for (const [waveIndex, wave] of plan.waves.entries()) {
    log.debug(`wave ${waveIndex}: ${wave.join(", ")}`);
    const settled = await Promise.all(wave.map((id) => runNodeSafely(id, waveIndex)));
    for (const record of settled) {
      records.set(record.unitId, record);
    }
  }

  const units = plan.order.flatMap((id) => {
    const record = records.get(id);
    return record ? [record] : [];
  });
  const outputs: Record<string, unknown> = {};
  for (const record of units) {
    if (record.status === "succeeded") {
      outputs[record.unitId] = record.output;
    }
  }

  const status = summarizeStatus(units);
  const completedAtMs = now();
  emit({ type: "run_completed", status, totalDurationMs: completedAtMs - startedAtMs });
  log.info(`execution ${executionId} (${graphName}) finished: ${status}`);

  return {
    ...base,
    status,
    order: plan.order,
    waves: plan.waves,
    units,
    outputs,
    completedAtMs,
    durationMs: completedAtMs - startedAtMs,
  };
}
