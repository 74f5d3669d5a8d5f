function stripCodeFence(text: string): string {
  const fence = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return (fence?.[1] ?? text).trim();
}

function findJsonSlice(text: string): string | null {
  const s = stripCodeFence(text);
  let start = s.indexOf("{");
  while (start !== -1) {
    let depth = 0;
    let inStr = false;
    let esc = false;

    for (let i = start; i < s.length; i++) {
      const ch = s[i];
      if (inStr) {
        if (esc) esc = false;
        else if (ch === "\\") esc = true;
        else if (ch === '"') inStr = false;
        continue;
      }
      if (ch === '"') {
        inStr = true;
        continue;
      }
      if (ch === "{") depth++;
      if (ch === "}") depth--;
      if (depth === 0) return s.slice(start, i + 1);
    }

    // unbalanced, try the next brace
    start = s.indexOf("{", start + 1);
  }
  return null;
}

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First balanced `{...}` block of a model reply, parsed; null when there is none. */
export function extractFirstJsonObject(text: string): JsonObject | null {
  const slice = findJsonSlice(text);
  if (!slice) return null;
  try {
    const parsed: unknown = JSON.parse(slice);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function clamp01(value: unknown): number | undefined {
  const x = typeof value === "string" && value.trim() ? Number(value) : value;
  if (typeof x !== "number" || !Number.isFinite(x)) return undefined;
  return Math.max(0, Math.min(1, x));
}

export function stringArray(value: unknown, limit = 20): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string" && v.trim().length > 0).slice(0, limit) : [];
}

export function optionalString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

export function clamp10(value: unknown): number | undefined {
  const x = typeof value === "string" && value.trim() ? Number(value) : value;
  if (typeof x !== "number" || !Number.isFinite(x)) return undefined;
  return Math.max(0, Math.min(10, x));
}
