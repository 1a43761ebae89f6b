function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pulls a JSON object out of a model response: the whole text, then a
 * fenced ```json block, then the outermost {...} span. Returns null when none
 * of those parse to an object.
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const direct = tryParse(text.trim());
  if (isPlainObject(direct)) return direct;

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    const parsed = tryParse(fenced[1].trim());
    if (isPlainObject(parsed)) return parsed;
  }

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start !== -1 && end > start) {
    const parsed = tryParse(text.slice(start, end + 1));
    if (isPlainObject(parsed)) return parsed;
  }

  return null;
}
