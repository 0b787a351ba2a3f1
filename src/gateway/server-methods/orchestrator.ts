// ---------------------------------------------------------------------------
// Gateway RPC handlers for health, dag.*, units.* and executions.* methods
// ---------------------------------------------------------------------------

import type { ExecutionResult, GraphDescription } from "../../orchestrator/types.js";
import type { GatewayRequestContext, GatewayRequestHandlers, RespondFn } from "./types.js";
import { GraphConfigError, toGraphDescription } from "../../orchestrator/graph-config.js";
import { ErrorCodes, errorShape } from "../protocol/index.js";

export type ExecutionSummary = {
  id: string;
  graphName: string;
  status: ExecutionResult["status"];
  startedAtMs: number;
  completedAtMs: number;
  durationMs: number;
  unitCounts: Record<"succeeded" | "failed" | "skipped", number>;
};

export function summarizeExecution(result: ExecutionResult): ExecutionSummary {
  const unitCounts = { succeeded: 0, failed: 0, skipped: 0 };
  for (const record of result.units) {
    unitCounts[record.status] += 1;
  }
  return {
    id: result.id,
    graphName: result.graphName,
    status: result.status,
    startedAtMs: result.startedAtMs,
    completedAtMs: result.completedAtMs,
    durationMs: result.durationMs,
    unitCounts,
  };
}

function requireOrchestrator(context: GatewayRequestContext, respond: RespondFn) {
  if (!context.orchestrator) {
    respond(false, undefined, errorShape(ErrorCodes.UNAVAILABLE, "orchestrator not initialized"));
    return undefined;
  }
  return context.orchestrator;
}

export const orchestratorHandlers: GatewayRequestHandlers = {
  health: ({ respond, context }) => {
    respond(
      true,
      {
        status: "ok",
        graphLoaded: Boolean(context.orchestrator),
        uptimeMs: Date.now() - context.startedAtMs,
        version: context.version,
      },
      undefined,
    );
  },

  // =========================================================================
  // GRAPH
  // =========================================================================

  "dag.info": ({ respond, context }) => {
    const orchestrator = requireOrchestrator(context, respond);
    if (!orchestrator) {
      return;
    }
    respond(true, orchestrator.describe(), undefined);
  },

  "dag.execute": async ({ params, respond, context }) => {
    const orchestrator = requireOrchestrator(context, respond);
    if (!orchestrator) {
      return;
    }

    let graph: GraphDescription | undefined;
    if (params.graph !== undefined) {
      try {
        graph = toGraphDescription(params.graph, "request");
      } catch (err) {
        if (!(err instanceof GraphConfigError)) {
          throw err;
        }
        respond(
          false,
          undefined,
          errorShape(ErrorCodes.INVALID_REQUEST, "invalid graph", { issues: err.issues }),
        );
        return;
      }
    }

    const result = await orchestrator.run(params.initial_input, graph ? { graph } : undefined);
    respond(true, result, undefined);
  },

  "units.list": ({ respond, context }) => {
    const orchestrator = requireOrchestrator(context, respond);
    if (!orchestrator) {
      return;
    }
    respond(true, { units: orchestrator.listUnits() }, undefined);
  },

  // =========================================================================
  // HISTORY
  // =========================================================================

  "executions.list": ({ params, respond, context }) => {
    const orchestrator = requireOrchestrator(context, respond);
    if (!orchestrator) {
      return;
    }
    const limit = typeof params.limit === "number" ? params.limit : undefined;
    if (params.limit !== undefined && (limit === undefined || !Number.isInteger(limit) || limit < 1)) {
      respond(
        false,
        undefined,
        errorShape(ErrorCodes.INVALID_REQUEST, "limit must be a positive integer"),
      );
      return;
    }
    const executions = orchestrator.listExecutions(limit).map(summarizeExecution);
    respond(true, { executions }, undefined);
  },

  "executions.get": async ({ params, respond, context }) => {
    const orchestrator = requireOrchestrator(context, respond);
    if (!orchestrator) {
      return;
    }
    const id = params.id;
    if (!id || typeof id !== "string") {
      respond(false, undefined, errorShape(ErrorCodes.INVALID_REQUEST, "missing id"));
      return;
    }
    const execution = await orchestrator.getExecution(id);
    if (!execution) {
      respond(false, undefined, errorShape(ErrorCodes.NOT_FOUND, `execution not found: ${id}`));
      return;
    }
    respond(true, execution, undefined);
  },
};
