// ---------------------------------------------------------------------------
// OrchestratorService -- graph lifecycle and execution history
// ---------------------------------------------------------------------------
// Process-scoped state created once at startup: the resolved default graph,
// its unit instances, the shared result cache and the execution history.
// Everything is passed in explicitly; nothing is looked up globally.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import { ResultCache } from "../cache/result-cache.js";
import { formatError, silentLogger, type SubsystemLogger } from "../logging.js";
import type { AnyUnit } from "../units/unit.js";
import { DEFAULT_HISTORY_LIMIT, ExecutionHistory } from "./history.js";
import { GraphError, GraphResolver } from "./resolver.js";
import { appendExecution, loadExecution, loadExecutions } from "./run-log.js";
import type { RunEventCallback } from "./run.js";
import { executeGraph, graphFailureResult } from "./run.js";
import type { UnitMetadata, UnitRegistry } from "./unit-registry.js";
import type { ExecutionPlan, ExecutionResult, GraphDescription, InputMapping } from "./types.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface OrchestratorServiceOpts<D> {
  graph: GraphDescription;
  registry: UnitRegistry<D>;
  deps: D;
  cache?: ResultCache;
  unitTimeoutMs?: number;
  historyLimit?: number;
  /** When set, every execution is also written to this directory. */
  historyDir?: string;
  onEvent?: RunEventCallback;
  log?: SubsystemLogger;
  nowMs?: () => number;
}

export type GraphInfo = {
  name: string;
  description: string;
  order: string[];
  waves: string[][];
  dependencies: Record<string, string[]>;
  nodes: Array<{
    id: string;
    unit: string;
    inputs: InputMapping;
    cache: boolean;
    timeoutMs?: number;
  }>;
};

export type UnitListing = UnitMetadata & {
  /** Ids of nodes in the default graph built from this unit. */
  nodes: string[];
};

// ---------------------------------------------------------------------------
// OrchestratorService
// ---------------------------------------------------------------------------

export class OrchestratorService<D> {
  private readonly opts: OrchestratorServiceOpts<D>;
  private readonly plan: ExecutionPlan;
  private readonly units: Map<string, AnyUnit>;
  private readonly history: ExecutionHistory;
  readonly cache: ResultCache;

  private constructor(
    opts: OrchestratorServiceOpts<D>,
    plan: ExecutionPlan,
    units: Map<string, AnyUnit>,
  ) {
    this.opts = opts;
    this.plan = plan;
    this.units = units;
    this.history = new ExecutionHistory(opts.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.cache = opts.cache ?? new ResultCache({ nowMs: opts.nowMs, log: opts.log });
  }

  /**
   * Resolve the default graph and build its units.
   * Throws `GraphError` for an invalid graph; nothing runs in that case.
   */
  static create<D>(opts: OrchestratorServiceOpts<D>): OrchestratorService<D> {
    const plan = GraphResolver.resolve(opts.graph.nodes);
    const units = opts.registry.instantiate(opts.graph.nodes, opts.deps);
    return new OrchestratorService(opts, plan, units);
  }

  private get log(): SubsystemLogger {
    return this.opts.log ?? silentLogger;
  }

  private now(): number {
    return this.opts.nowMs?.() ?? Date.now();
  }

  // -------------------------------------------------------------------------
  // describe
  // -------------------------------------------------------------------------

  describe(): GraphInfo {
    const { graph } = this.opts;
    return {
      name: graph.name,
      description: graph.description ?? "",
      order: [...this.plan.order],
      waves: this.plan.waves.map((w) => [...w]),
      dependencies: { ...this.plan.dependencies },
      nodes: graph.nodes.map((n) => ({
        id: n.id,
        unit: n.unit,
        inputs: { ...n.inputs },
        cache: n.cache !== false,
        ...(n.timeoutMs !== undefined ? { timeoutMs: n.timeoutMs } : {}),
      })),
    };
  }

  // -------------------------------------------------------------------------
  // listUnits
  // -------------------------------------------------------------------------

  listUnits(): UnitListing[] {
    return this.opts.registry.list().map((meta) => ({
      ...meta,
      nodes: this.opts.graph.nodes.filter((n) => n.unit === meta.ref).map((n) => n.id),
    }));
  }

  // -------------------------------------------------------------------------
  // run
  // -------------------------------------------------------------------------

  /**
   * Execute the default graph, or `opts.graph` when given. Always resolves
   * to a complete record, which is also added to the history.
   */
  async run(initialInput?: unknown, opts?: { graph?: GraphDescription }): Promise<ExecutionResult> {
    const graph = opts?.graph ?? this.opts.graph;
    let units = this.units;

    if (opts?.graph) {
      try {
        units = this.opts.registry.instantiate(opts.graph.nodes, this.opts.deps);
      } catch (err) {
        if (!(err instanceof GraphError)) {
          throw err;
        }
        const startedAtMs = this.now();
        const result = graphFailureResult({
          id: randomUUID(),
          graphName: graph.name,
          initialInput,
          startedAtMs,
          completedAtMs: startedAtMs,
          error: err,
        });
        this.log.error(`graph ${graph.name} rejected: ${err.message}`);
        await this.record(result);
        return result;
      }
    }

    const result = await executeGraph({
      graph,
      units,
      initialInput,
      cache: this.cache,
      unitTimeoutMs: this.opts.unitTimeoutMs,
      onEvent: this.opts.onEvent,
      log: this.opts.log,
      nowMs: this.opts.nowMs,
    });
    await this.record(result);
    return result;
  }

  /** Records in the history are never the objects handed to callers. */
  private copyOf(result: ExecutionResult): ExecutionResult {
    try {
      return structuredClone(result);
    } catch (err) {
      this.log.warn(`execution ${result.id} is not cloneable, sharing it: ${formatError(err)}`);
      return result;
    }
  }

  private async record(result: ExecutionResult): Promise<void> {
    this.history.add(this.copyOf(result));
    if (!this.opts.historyDir) {
      return;
    }
    try {
      await appendExecution(this.opts.historyDir, result);
    } catch (err) {
      this.log.warn(`failed to persist execution ${result.id}: ${formatError(err)}`);
    }
  }

  // -------------------------------------------------------------------------
  // history accessors
  // -------------------------------------------------------------------------

  async getExecution(id: string): Promise<ExecutionResult | undefined> {
    const cached = this.history.get(id);
    if (cached) {
      return this.copyOf(cached);
    }
    if (!this.opts.historyDir) {
      return undefined;
    }
    return (await loadExecution(this.opts.historyDir, id)) ?? undefined;
  }

  listExecutions(limit?: number): ExecutionResult[] {
    return this.history.list(limit).map((r) => this.copyOf(r));
  }

  /** Load persisted executions into the in-memory history. Returns how many were read. */
  async hydrate(): Promise<number> {
    if (!this.opts.historyDir) {
      return 0;
    }
    const stored = await loadExecutions(this.opts.historyDir, {
      limit: this.history.limit,
      onSkip: (file, reason) => this.log.warn(`skipping stored execution ${file}: ${reason}`),
    });
    this.history.restore(stored);
    return stored.length;
  }
}
