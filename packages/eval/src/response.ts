import { isRecord } from '@webgrade/sdk';
import { ParseFault } from './errors.js';

const FENCED_BLOCK = /```[a-zA-Z]*\s*\n?([\s\S]*?)```/;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    if (err instanceof SyntaxError) return { ok: false };
    throw err;
  }
}

/** End index (inclusive) of the balanced object starting at `start`, or -1. */
function balancedObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Pull a JSON object out of free-form agent output: the whole text, then a fenced code block,
 * then the first balanced `{...}` that parses.
 */
export function extractJsonObject(text: string): unknown {
  const whole = tryParse(text.trim());
  if (whole.ok) return whole.value;

  const fenced = FENCED_BLOCK.exec(text);
  if (fenced) {
    const block = tryParse(fenced[1].trim());
    if (block.ok) return block.value;
  }

  for (let start = text.indexOf('{'); start >= 0; start = text.indexOf('{', start + 1)) {
    const end = balancedObjectEnd(text, start);
    if (end < 0) continue;
    const candidate = tryParse(text.slice(start, end + 1));
    if (candidate.ok) return candidate.value;
  }

  throw new ParseFault('Agent response is not valid JSON', 'agent_response');
}

/**
 * Decode a raw agent response (JSON text or an already decoded object).
 */
export function readAgentResponse(raw: unknown): unknown {
  if (raw === undefined || raw === null) {
    throw new ParseFault('Agent response is missing', 'agent_response');
  }
  if (typeof raw === 'string') return extractJsonObject(raw);
  if (isRecord(raw)) return raw;
  throw new ParseFault(`Agent response must be a JSON object, got ${Array.isArray(raw) ? 'array' : typeof raw}`, 'agent_response');
}
