/**
 * JSON extraction from completion text.
 *
 * Models wrap the object in prose or code fences often enough that a
 * single JSON.parse is not sufficient. Strategies run in order:
 * the whole text, the first fenced code block, then a brace-depth scan
 * from the first `{` that respects string literals and escapes.
 */

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(text: string): JsonObject | undefined {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return undefined;
  }
  return isJsonObject(value) ? value : undefined;
}

/**
 * Slice from the first `{` to its matching `}`, or undefined if it never closes.
 */
export function scanBalancedObject(text: string): string | undefined {
  const start = text.indexOf('{');
  if (start === -1) return undefined;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (escape) {
      escape = false;
      continue;
    }
    if (ch === '\\' && inString) {
      escape = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (ch === '{') depth++;
    if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return undefined;
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Extract the JSON object a completion contains. Undefined means the model
 * produced nothing usable, which callers treat as "no recommendation".
 */
export function extractJSON(text: string): JsonObject | undefined {
  const whole = parseObject(text.trim());
  if (whole) return whole;

  const fenced = FENCED_BLOCK.exec(text);
  if (fenced) {
    const inner = parseObject(fenced[1].trim());
    if (inner) return inner;
  }

  const scanned = scanBalancedObject(text);
  return scanned === undefined ? undefined : parseObject(scanned);
}
