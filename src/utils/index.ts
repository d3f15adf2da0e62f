export function safeJsonParse<T>(input: string): T | null {
  try {
    return JSON.parse(input) as T;
  } catch (_error) {
    return null;
  }
}

const FENCE_REGEX = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Pulls the first JSON object out of model output. Handles fenced blocks and
 * prose before or after the object. Returns null when nothing parses.
 */
export function extractJsonObject(text: string): unknown {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const direct = safeJsonParse<unknown>(trimmed);
  if (direct !== null && typeof direct === "object") {
    return direct;
  }

  const fenced = FENCE_REGEX.exec(trimmed);
  if (fenced) {
    const inner = safeJsonParse<unknown>(fenced[1].trim());
    if (inner !== null && typeof inner === "object") {
      return inner;
    }
  }

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start !== -1 && end > start) {
    const sliced = safeJsonParse<unknown>(trimmed.slice(start, end + 1));
    if (sliced !== null && typeof sliced === "object") {
      return sliced;
    }
  }

  return null;
}

export function normalizeText(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
