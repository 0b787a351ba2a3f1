// ---------------------------------------------------------------------------
// Tool Registry – name-addressable data-fetch strategies
// ---------------------------------------------------------------------------
// Tools declare a TypeBox parameter schema. Arguments are validated (with
// defaults applied) before the strategy runs; every failure surfaces as a
// `ToolError` with a kind the caller can branch on.
// ---------------------------------------------------------------------------

import type { Static, TSchema } from "@sinclair/typebox";
import { formatError, silentLogger, type SubsystemLogger } from "../logging.js";
import { checkValue } from "../schema/typebox.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export const TOOL_ERROR_KINDS = [
  "unknownTool",
  "invalidArgs",
  "unavailable",
  "executionFailed",
  "duplicateTool",
] as const;

export type ToolErrorKind = (typeof TOOL_ERROR_KINDS)[number];

export class ToolError extends Error {
  readonly kind: ToolErrorKind;
  readonly toolName: string;
  readonly issues?: string[];

  constructor(
    kind: ToolErrorKind,
    toolName: string,
    message: string,
    opts?: { cause?: unknown; issues?: string[] },
  ) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "ToolError";
    this.kind = kind;
    this.toolName = toolName;
    this.issues = opts?.issues;
  }
}

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

export type ToolCallContext = {
  /** Aborted when the calling unit times out or is cancelled. */
  signal?: AbortSignal;
};

export interface ToolDescriptor<P extends TSchema = TSchema, R = unknown> {
  name: string;
  description: string;
  parameters: P;
  /** `false` marks a strategy that is registered but not implemented. */
  available?: boolean;
  execute(args: Static<P>, ctx: ToolCallContext): Promise<R>;
}

export type ToolMetadata = {
  name: string;
  description: string;
  parameters: TSchema;
  available: boolean;
};

// ---------------------------------------------------------------------------
// ToolRegistry
// ---------------------------------------------------------------------------

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();
  private readonly log: SubsystemLogger;

  constructor(opts?: { log?: SubsystemLogger }) {
    this.log = opts?.log ?? silentLogger;
  }

  /** Add a tool. Throws `ToolError{kind:"duplicateTool"}` if the name is taken. */
  register<P extends TSchema, R>(descriptor: ToolDescriptor<P, R>): void {
    if (this.tools.has(descriptor.name)) {
      throw new ToolError(
        "duplicateTool",
        descriptor.name,
        `Tool "${descriptor.name}" is already registered`,
      );
    }
    this.tools.set(descriptor.name, descriptor);
    this.log.debug(`registered tool: ${descriptor.name}`);
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  isAvailable(name: string): boolean {
    const tool = this.tools.get(name);
    return tool !== undefined && tool.available !== false;
  }

  /** Metadata for every registered tool, in registration order. */
  list(): ToolMetadata[] {
    return [...this.tools.values()].map((t) => ({
      name: t.name,
      description: t.description,
      parameters: t.parameters,
      available: t.available !== false,
    }));
  }

  // -------------------------------------------------------------------------
  // call
  // -------------------------------------------------------------------------

  async call(name: string, args: unknown, ctx: ToolCallContext = {}): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolError("unknownTool", name, `Tool "${name}" is not registered`);
    }

    const checked = checkValue(tool.parameters, args);
    if (!checked.ok) {
      throw new ToolError(
        "invalidArgs",
        name,
        `Invalid arguments for "${name}": ${checked.issues.join("; ")}`,
        { issues: checked.issues },
      );
    }

    if (tool.available === false) {
      throw new ToolError("unavailable", name, `Tool "${name}" is not available`);
    }

    this.log.info(`calling tool ${name}`);
    try {
      return await tool.execute(checked.value, ctx);
    } catch (err) {
      this.log.warn(`tool ${name} failed: ${formatError(err)}`);
      throw new ToolError("executionFailed", name, `Tool "${name}" failed: ${formatError(err)}`, {
        cause: err,
      });
    }
  }
}
