const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parsesAsObject = (candidate: string): boolean => {
  try {
    return isJsonObject(JSON.parse(candidate));
  } catch {
    return false;
  }
};

/** Index just past the brace that closes the object opened at `start`, or -1. */
const closingBraceEnd = (text: string, start: number): number => {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const ch = text[index];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth += 1;
    else if (ch === "}") {
      depth -= 1;
      if (depth === 0) return index + 1;
    }
  }
  return -1;
};

const firstObjectIn = (text: string): string | null => {
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    const end = closingBraceEnd(text, start);
    if (end === -1) continue;
    const candidate = text.slice(start, end).trim();
    if (parsesAsObject(candidate)) return candidate;
  }
  return null;
};

/** Pulls the first JSON object out of model output, preferring ```json fences. */
export const extractJsonObject = (text: string): string => {
  for (const match of text.matchAll(/```(?:json)?\s*([\s\S]*?)```/gi)) {
    const body = (match[1] ?? "").trim();
    if (parsesAsObject(body)) return body;
    const nested = firstObjectIn(body);
    if (nested) return nested;
  }

  const bare = firstObjectIn(text);
  if (bare) return bare;
  throw new Error("No JSON object found in model output.");
};
