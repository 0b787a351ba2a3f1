// ---------------------------------------------------------------------------
// Orchestrator – Execution Run Log
// ---------------------------------------------------------------------------
// Each execution is stored as an individual JSON file under:
//   {historyDir}/{executionId}.json
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { literalUnion } from "../schema/typebox.js";
import type { ExecutionResult } from "./types.js";
import { EXECUTION_STATUSES, UNIT_ERROR_KINDS, UNIT_RUN_STATUSES } from "./types.js";

// ---------------------------------------------------------------------------
// Stored shape
// ---------------------------------------------------------------------------

const UnitRunRecordSchema = Type.Object({
  unitId: Type.String(),
  unit: Type.String(),
  wave: Type.Number(),
  status: literalUnion(UNIT_RUN_STATUSES),
  output: Type.Optional(Type.Unknown()),
  error: Type.Optional(
    Type.Object({
      kind: literalUnion(UNIT_ERROR_KINDS),
      message: Type.String(),
      issues: Type.Optional(Type.Array(Type.String())),
    }),
  ),
  cacheHit: Type.Optional(Type.Boolean()),
  skippedBecause: Type.Optional(Type.Array(Type.String())),
  startedAtMs: Type.Number(),
  completedAtMs: Type.Number(),
  durationMs: Type.Number(),
});

const ExecutionResultSchema = Type.Object({
  id: Type.String(),
  graphName: Type.String(),
  status: literalUnion(EXECUTION_STATUSES),
  order: Type.Array(Type.String()),
  waves: Type.Array(Type.Array(Type.String())),
  units: Type.Array(UnitRunRecordSchema),
  outputs: Type.Record(Type.String(), Type.Unknown()),
  initialInput: Type.Optional(Type.Unknown()),
  error: Type.Optional(
    Type.Object({
      kind: Type.Literal("graph"),
      graphErrorKind: Type.String(),
      message: Type.String(),
      path: Type.Optional(Type.Array(Type.String())),
    }),
  ),
  startedAtMs: Type.Number(),
  completedAtMs: Type.Number(),
  durationMs: Type.Number(),
});

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

function executionFilePath(historyDir: string, id: string): string | null {
  return SAFE_ID.test(id) ? path.join(historyDir, `${id}.json`) : null;
}

async function readExecution(filePath: string): Promise<ExecutionResult | null> {
  const raw = await fs.readFile(filePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  return Value.Check(ExecutionResultSchema, parsed) ? parsed : null;
}

// ---------------------------------------------------------------------------
// appendExecution
// ---------------------------------------------------------------------------

let writeSeq = 0;

/**
 * Persist an execution record. Creates the directory if missing.
 * Uses atomic write (tmp + rename) for crash safety.
 */
export async function appendExecution(historyDir: string, result: ExecutionResult): Promise<void> {
  const filePath = executionFilePath(historyDir, result.id);
  if (!filePath) {
    throw new Error(`Execution id is not a safe file name: ${result.id}`);
  }
  await fs.mkdir(historyDir, { recursive: true });

  const tmp = `${filePath}.tmp.${process.pid}.${writeSeq++}`;
  await fs.writeFile(tmp, JSON.stringify(result, null, 2), "utf-8");
  await fs.rename(tmp, filePath);
}

// ---------------------------------------------------------------------------
// loadExecutions
// ---------------------------------------------------------------------------

/**
 * Load stored executions, newest first by `startedAtMs`. A missing directory
 * yields an empty list; unreadable or malformed files are reported through
 * `onSkip` and left out.
 */
export async function loadExecutions(
  historyDir: string,
  opts?: { limit?: number; onSkip?: (file: string, reason: string) => void },
): Promise<ExecutionResult[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(historyDir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return [];
    }
    throw err;
  }

  const results: ExecutionResult[] = [];
  for (const file of entries.filter((f) => f.endsWith(".json"))) {
    try {
      const result = await readExecution(path.join(historyDir, file));
      if (result) {
        results.push(result);
      } else {
        opts?.onSkip?.(file, "unexpected shape");
      }
    } catch (err) {
      opts?.onSkip?.(file, err instanceof Error ? err.message : String(err));
    }
  }

  results.sort((a, b) => b.startedAtMs - a.startedAtMs);

  const limit = opts?.limit;
  if (limit !== undefined && limit > 0) {
    return results.slice(0, limit);
  }
  return results;
}

// ---------------------------------------------------------------------------
// loadExecution (single)
// ---------------------------------------------------------------------------

/** Load one execution by id. Returns `null` when not found. */
export async function loadExecution(
  historyDir: string,
  id: string,
): Promise<ExecutionResult | null> {
  const filePath = executionFilePath(historyDir, id);
  if (!filePath) {
    return null;
  }
  try {
    return await readExecution(filePath);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
}
