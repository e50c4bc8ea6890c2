import { ModelOutputError } from '../lib/errors.js';

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

/** End index (inclusive) of the brace-balanced object opening at `open`, ignoring braces inside strings. */
function closingBrace(s: string, open: number): number {
  let depth = 0;
  let quoted = false;

  for (let i = open; i < s.length; i++) {
    const ch = s[i];
    if (quoted) {
      if (ch === '\\') i++;
      else if (ch === '"') quoted = false;
      continue;
    }
    if (ch === '"') quoted = true;
    else if (ch === '{') depth++;
    else if (ch === '}' && --depth === 0) return i;
  }
  return -1;
}

function* objectCandidates(s: string): Generator<string> {
  for (let open = s.indexOf('{'); open !== -1; open = s.indexOf('{', open + 1)) {
    const close = closingBrace(s, open);
    if (close !== -1) yield s.slice(open, close + 1);
  }
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Parses the single JSON object a judge returns. The object may be wrapped in a
 * code fence or surrounded by stray prose; anything else is a ModelOutputError.
 */
export function parseJsonPayload(text: string): unknown {
  const body = (text.match(FENCE)?.[1] ?? text).trim();
  if (!body) throw new ModelOutputError('Model returned an empty response');

  const whole = tryParse(body);
  if (whole.ok) return whole.value;

  let sawObject = false;
  for (const candidate of objectCandidates(body)) {
    sawObject = true;
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed.value;
  }

  throw new ModelOutputError(
    sawObject
      ? `Model returned malformed JSON: ${body.slice(0, 200)}`
      : `Model response contains no JSON object: ${body.slice(0, 200)}`
  );
}
