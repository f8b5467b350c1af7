import { isRecord } from "../infra/http.js";

function parseRecord(text: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Best-effort JSON object from model output: the whole text first, then the
 * span from the first `{` to the last `}` (covers code fences and chatter).
 */
export function extractJsonObject(raw: string): Record<string, unknown> | null {
  const text = raw.trim();
  if (!text) return null;

  const direct = parseRecord(text);
  if (direct) return direct;

  const match = text.match(/\{[\s\S]*\}/);
  if (!match) return null;
  return parseRecord(match[0]);
}
