import type { OrchestratorService } from "../../orchestrator/service.js";
import type { ErrorShape } from "../protocol/index.js";

export type GatewayRequest = {
  type: "req";
  id: string;
  method: string;
};

export type GatewayRequestContext = {
  /** Absent until the default graph has been built. */
  orchestrator?: Pick<
    OrchestratorService<unknown>,
    "describe" | "listUnits" | "run" | "getExecution" | "listExecutions"
  >;
  startedAtMs: number;
  version: string;
};

export type RespondFn = (ok: boolean, payload?: unknown, error?: ErrorShape) => void;

export type GatewayRequestHandlerOptions = {
  req: GatewayRequest;
  params: Record<string, unknown>;
  respond: RespondFn;
  context: GatewayRequestContext;
};

export type GatewayRequestHandler = (opts: GatewayRequestHandlerOptions) => Promise<void> | void;

export type GatewayRequestHandlers = Record<string, GatewayRequestHandler>;
