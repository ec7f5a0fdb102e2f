import { isRecord } from '../../utils/guards';

/** First balanced `{...}` in free text, skipping braces inside string literals. */
export function extractFirstJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Parses a model reply into an object, tolerating code fences and chatter around it. */
export function parseJsonObject(text: string): Record<string, unknown> | null {
  const direct = tryParse(text.trim());
  if (isRecord(direct)) return direct;

  const candidate = extractFirstJsonObject(text);
  if (!candidate) return null;
  const scanned = tryParse(candidate);
  return isRecord(scanned) ? scanned : null;
}
