/**
 * Salvage JSON arrays out of free-text model output.
 */

import { ResponseFormatError } from '../types/errors.js';

const MAX_COMMA_FIXES = 50;

const MISSING_COMMA = /Expected ',' or|Unexpected (?:string|number|token [{["])/;
const BAD_ESCAPE = /Bad (?:escaped character|Unicode escape)|Invalid \\?escape/i;
const POSITION = /at position (\d+)/;

export interface SalvagedJson {
  value: unknown[];
  corrected: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Insert missing commas until the text parses.
 * Returns null when the text has a different defect.
 */
export function fixMissingComma(content: string): { text: string; value: unknown } | null {
  let text = content;
  let lastPosition = -1;

  for (let fix = 0; fix <= MAX_COMMA_FIXES; fix++) {
    try {
      return { text, value: JSON.parse(text) };
    } catch (error) {
      const message = errorMessage(error);
      const match = POSITION.exec(message);
      if (!MISSING_COMMA.test(message) || !match) return null;

      let position = Number(match[1]);
      if (position <= lastPosition) return null;

      // Prefer the end of the previous line, where the delimiter was dropped
      const lastNewline = text.lastIndexOf('\n', position - 1);
      if (
        lastNewline > 0 &&
        text[lastNewline - 1] !== ',' &&
        text.slice(lastNewline, position).trim() === ''
      ) {
        position = lastNewline;
      }
      text = text.slice(0, position) + ',' + text.slice(position);
      lastPosition = position + 1;
    }
  }
  return null;
}

/**
 * Cut the outermost `[...]` out of a response and parse it.
 *
 * @throws ResponseFormatError when no array can be recovered
 */
export function extractJsonArray(responseText: string): SalvagedJson {
  const start = responseText.indexOf('[');
  const end = responseText.lastIndexOf(']');
  if (start === -1 || end <= start) {
    throw new ResponseFormatError('no_json_array', 'Response contains no JSON array');
  }
  const slice = responseText.slice(start, end + 1);

  let parsed: unknown;
  let corrected = false;
  try {
    parsed = JSON.parse(slice);
  } catch (error) {
    const message = errorMessage(error);
    if (BAD_ESCAPE.test(message)) {
      throw new ResponseFormatError('invalid_escape', message);
    }
    const fixed = MISSING_COMMA.test(message) ? fixMissingComma(slice) : null;
    if (!fixed) {
      throw new ResponseFormatError('json_decode', message);
    }
    parsed = fixed.value;
    corrected = true;
  }

  if (!Array.isArray(parsed)) {
    throw new ResponseFormatError('json_decode', 'Response JSON is not an array');
  }
  return { value: parsed, corrected };
}
