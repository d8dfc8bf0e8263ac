type ParseResult = { readonly ok: true; readonly value: unknown } | { readonly ok: false };

function tryParse(text: string): ParseResult {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
}

const FENCED_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/;

/** Index one past the bracket that closes the one at `start`, or -1. */
function findClosing(text: string, start: number): number {
  const open = text[start];
  const close = open === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === open) depth++;
    else if (ch === close && --depth === 0) return i + 1;
  }

  return -1;
}

/**
 * Pulls a JSON value out of model output. Accepts bare JSON, a fenced
 * code block, or the first balanced object or array embedded in prose.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();

  const direct = tryParse(trimmed);
  if (direct.ok) return direct.value;

  const fenced = FENCED_BLOCK.exec(trimmed)?.[1];
  if (fenced) {
    const parsed = tryParse(fenced.trim());
    if (parsed.ok) return parsed.value;
  }

  for (const opener of ['{', '[']) {
    const start = trimmed.indexOf(opener);
    if (start === -1) continue;

    const end = findClosing(trimmed, start);
    if (end === -1) continue;

    const parsed = tryParse(trimmed.slice(start, end));
    if (parsed.ok) return parsed.value;
  }

  throw new SyntaxError(`Failed to extract JSON from content: ${trimmed.slice(0, 100)}`);
}
