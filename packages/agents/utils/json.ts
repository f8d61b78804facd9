// Recover a JSON object from model output that may be wrapped in prose or code fences.

/**
 * Extract the first balanced JSON object substring from arbitrary text.
 * Braces inside quoted strings are ignored.
 */
export function extractFirstJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === '\\') {
        escape = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      continue;
    }

    if (ch === '{') depth++;
    if (ch === '}') depth--;

    if (depth === 0) return text.slice(start, i + 1);
  }

  return null;
}

/** Parse the first JSON object in `text`; null when there is none or it is invalid. */
export function tryParseFirstJsonObject(text: string): Record<string, unknown> | null {
  const jsonStr = extractFirstJsonObject(text);
  if (!jsonStr) return null;
  try {
    const parsed: unknown = JSON.parse(jsonStr);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
