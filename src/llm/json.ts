// ---------------------------------------------------------------------------
// LLM – structured-object extraction from free-form completions
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const THINK_BLOCK = /<think>[\s\S]*?(?:<\/think>|$)/gi;
const CODE_FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

/** Index just past the `{...}` starting at `start`, or -1 if unbalanced. */
function scanObject(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
  }
  return -1;
}

function tryParseObject(candidate: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Pull the first JSON object out of a model response. Reasoning blocks
 * (`<think>…</think>`), markdown fences and prose around the object are
 * ignored. Returns `undefined` when no parseable object is present.
 */
export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const cleaned = text.replace(THINK_BLOCK, "").trim();

  const fenced = CODE_FENCE.exec(cleaned);
  if (fenced?.[1]) {
    const parsed = tryParseObject(fenced[1].trim());
    if (parsed) {
      return parsed;
    }
  }

  let start = cleaned.indexOf("{");
  while (start !== -1) {
    const end = scanObject(cleaned, start);
    if (end === -1) {
      return undefined;
    }
    const parsed = tryParseObject(cleaned.slice(start, end));
    if (parsed) {
      return parsed;
    }
    start = cleaned.indexOf("{", start + 1);
  }
  return undefined;
}
