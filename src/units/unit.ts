// ---------------------------------------------------------------------------
// Unit Contract – validate → run, failures folded into a tagged outcome
// ---------------------------------------------------------------------------

import type { Static, TSchema } from "@sinclair/typebox";
import type { ResultCache } from "../cache/result-cache.js";
import type { SubsystemLogger } from "../logging.js";
import { formatError } from "../logging.js";
import { checkValue } from "../schema/typebox.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ValidationError extends Error {
  readonly kind = "validation" as const;
  readonly unitName: string;
  readonly issues: string[];

  constructor(unitName: string, issues: string[]) {
    super(`Invalid input for ${unitName}: ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.unitName = unitName;
    this.issues = issues;
  }
}

export class UnitExecutionError extends Error {
  readonly kind = "execution" as const;
  readonly unitName: string;

  constructor(unitName: string, message: string, opts?: { cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "UnitExecutionError";
    this.unitName = unitName;
  }
}

export class UnitTimeoutError extends Error {
  readonly kind = "timeout" as const;
  readonly timeoutMs: number;

  constructor(unitId: string, timeoutMs: number) {
    super(`Unit "${unitId}" timed out after ${timeoutMs}ms`);
    this.name = "UnitTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

// ---------------------------------------------------------------------------
// Outcome & context
// ---------------------------------------------------------------------------

export type UnitFailureKind = "validation" | "execution" | "timeout";

export type UnitOutcome<T = unknown> =
  | { status: "succeeded"; output: T }
  | { status: "failed"; errorKind: UnitFailureKind; message: string; issues?: string[] };

export interface UnitRunContext {
  executionId: string;
  /** Aborted when the engine gives up on the invocation. */
  signal: AbortSignal;
  log: SubsystemLogger;
  cache: ResultCache;
}

// ---------------------------------------------------------------------------
// Unit
// ---------------------------------------------------------------------------

export abstract class Unit<S extends TSchema = TSchema, O = unknown> {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly inputSchema: S;

  /**
   * Cross-field constraints the schema cannot express. Returned messages are
   * reported together with the schema violations.
   */
  protected checkInput(_input: Static<S>): string[] {
    return [];
  }

  /** Apply defaults and check the input. Throws `ValidationError` listing every issue. */
  validate(input: unknown): Static<S> {
    const checked = checkValue(this.inputSchema, input);
    if (!checked.ok) {
      throw new ValidationError(this.name, checked.issues);
    }
    const extra = this.checkInput(checked.value);
    if (extra.length > 0) {
      throw new ValidationError(this.name, extra);
    }
    return checked.value;
  }

  protected abstract run(input: Static<S>, ctx: UnitRunContext): Promise<O>;

  /** Never throws. */
  async execute(raw: unknown, ctx: UnitRunContext): Promise<UnitOutcome<O>> {
    let input: Static<S>;
    try {
      input = this.validate(raw);
    } catch (err) {
      if (err instanceof ValidationError) {
        return {
          status: "failed",
          errorKind: "validation",
          message: err.message,
          issues: err.issues,
        };
      }
      return { status: "failed", errorKind: "execution", message: formatError(err) };
    }

    try {
      const output = await this.run(input, ctx);
      return { status: "succeeded", output };
    } catch (err) {
      if (err instanceof UnitTimeoutError || ctx.signal.aborted) {
        const reason: unknown = ctx.signal.reason;
        return {
          status: "failed",
          errorKind: "timeout",
          message: formatError(reason ?? err),
        };
      }
      return { status: "failed", errorKind: "execution", message: formatError(err) };
    }
  }
}

export type AnyUnit = Unit<TSchema, unknown>;
