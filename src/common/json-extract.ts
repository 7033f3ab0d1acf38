/**
 * Locates structured data in untrusted model text.
 *
 * Tries, in order: the whole text, a ```json fenced block, then each balanced
 * {...} or [...] span from left to right until one parses. Returns undefined
 * when nothing parses.
 */

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Balanced object/array span opening at `start` */
function balancedSpan(text: string, start: number): string | null {
  const stack: string[] = [];
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
    else if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') {
      if (stack.pop() !== ch) return null;
      if (stack.length === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

export function extractJson(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) return undefined;

  const whole = tryParse(trimmed);
  if (whole !== undefined) return whole;

  const fenced = trimmed.match(FENCE_PATTERN);
  if (fenced) {
    const parsed = tryParse(fenced[1].trim());
    if (parsed !== undefined) return parsed;
  }

  for (let start = trimmed.search(/[[{]/); start >= 0; start = nextOpener(trimmed, start + 1)) {
    const span = balancedSpan(trimmed, start);
    const parsed = span ? tryParse(span) : undefined;
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

function nextOpener(text: string, from: number): number {
  const offset = text.slice(from).search(/[[{]/);
  return offset < 0 ? -1 : from + offset;
}
