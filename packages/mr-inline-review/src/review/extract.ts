const FENCE_MARKER = /```(?:json)?\s*\n?/g;

/**
 * Finds the first top-level `{...}` block in free-form model output that parses as a JSON object
 * with a `summary` key. Fence markers are dropped before scanning.
 *
 * Braces are balanced over raw characters; braces inside string values are not treated specially,
 * so a string holding an unmatched `{` or `}` can hide an otherwise valid payload.
 */
export function extractReviewJson(text: string): Record<string, unknown> | null {
  const cleaned = text.replace(FENCE_MARKER, "");

  let depth = 0;
  let start = -1;

  for (let index = 0; index < cleaned.length; index += 1) {
    const char = cleaned[index];
    if (char === "{") {
      if (depth === 0) {
        start = index;
      }
      depth += 1;
    } else if (char === "}") {
      if (depth === 0) {
        // Stray closer in surrounding prose.
        continue;
      }
      depth -= 1;
      if (depth === 0) {
        const candidate = parseCandidate(cleaned.slice(start, index + 1));
        if (candidate) {
          return candidate;
        }
      }
    }
  }

  return null;
}

function parseCandidate(candidate: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }

  if (!isRecord(parsed) || !("summary" in parsed)) {
    return null;
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
