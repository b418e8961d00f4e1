/**
 * Best-effort recovery of structured values from model output
 *
 * Model responses mix prose, markdown fences and JSON. These helpers find the
 * first balanced JSON object or array in the text and parse it, falling back
 * to parsing the whole text. They never throw: failure is returned as an
 * ExtractionError carrying the raw text.
 */

import { JsonObject, JsonValue } from '../types/common.js';
import { ErrorCategory, ExtractionError } from '../types/error-handling.js';

export type ExtractionResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ExtractionError };

type Shape = 'object' | 'array';

const DELIMITERS: Record<Shape, { open: string; close: string }> = {
  object: { open: '{', close: '}' },
  array: { open: '[', close: ']' },
};

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Finds the first span that opens with `open` and closes at matching depth.
 * Brackets inside JSON string literals are ignored.
 */
export function findBalancedSpan(text: string, open: string, close: string): string | null {
  let start = text.indexOf(open);

  while (start !== -1) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];

      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === '\\') {
          escaped = true;
        } else if (ch === '"') {
          inString = false;
        }
        continue;
      }

      if (ch === '"') {
        inString = true;
      } else if (ch === open) {
        depth++;
      } else if (ch === close) {
        depth--;
        if (depth === 0) {
          return text.slice(start, i + 1);
        }
      }
    }

    // Unclosed from here; try the next opener
    start = text.indexOf(open, start + 1);
  }

  return null;
}

function tryParse(text: string): { parsed: true; value: unknown } | { parsed: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { parsed: true, value };
  } catch {
    return { parsed: false };
  }
}

function isJsonArray(value: unknown): value is JsonValue[] {
  return Array.isArray(value);
}

function extract<T extends JsonValue>(
  text: string,
  shape: Shape,
  guard: (value: unknown) => value is T
): ExtractionResult<T> {
  const { open, close } = DELIMITERS[shape];

  const span = findBalancedSpan(text, open, close);
  if (span !== null) {
    const attempt = tryParse(span);
    if (attempt.parsed && guard(attempt.value)) {
      return { ok: true, value: attempt.value };
    }
  }

  const whole = tryParse(text.trim());
  if (whole.parsed && guard(whole.value)) {
    return { ok: true, value: whole.value };
  }

  return {
    ok: false,
    error: {
      category: ErrorCategory.MODEL_OUTPUT_UNPARSEABLE,
      message: `Failed to parse response as JSON ${shape}`,
      rawText: text,
    },
  };
}

/**
 * Extract the first JSON object from `text`
 */
export function extractObject(text: string): ExtractionResult<JsonObject> {
  return extract(text, 'object', isJsonObject);
}

/**
 * Extract the first JSON array from `text`
 */
export function extractArray(text: string): ExtractionResult<JsonValue[]> {
  return extract(text, 'array', isJsonArray);
}
