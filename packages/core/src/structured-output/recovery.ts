import { isJsonObject, type JsonObject, type JsonValue } from '@aiflow/shared';
import { decodeJson } from './json';
import { sanitizeKeys } from './sanitize';
import { STRUCTURED_FIELDS, type StructuredField } from './types';

/**
 * Escapes bare control characters inside string literals. Models often emit newlines and tabs
 * verbatim in string values, which makes JSON.parse fail; structural whitespace is left alone.
 */
export const repairLiteralControlChars = (raw: string): string => {
  let result = '';
  let inString = false;
  let escaped = false;

  for (const ch of raw) {
    if (escaped) {
      result += ch;
      escaped = false;
    } else if (ch === '\\' && inString) {
      result += ch;
      escaped = true;
    } else if (ch === '"') {
      result += ch;
      inString = !inString;
    } else if (inString && ch === '\n') {
      result += '\\n';
    } else if (inString && ch === '\r') {
      result += '\\r';
    } else if (inString && ch === '\t') {
      result += '\\t';
    } else {
      result += ch;
    }
  }

  return result;
};

/**
 * Bracket depth outside double-quoted strings. Reads forward from the last index asked for,
 * so ascending lookups cost one pass over the text.
 */
const createDepthTracker = (text: string): ((index: number) => number) => {
  let cursor = 0;
  let depth = 0;
  let inString = false;
  let escaped = false;

  return (index: number): number => {
    if (index < cursor) {
      cursor = 0;
      depth = 0;
      inString = false;
      escaped = false;
    }

    for (; cursor < index; cursor += 1) {
      const ch = text[cursor];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }

      if (ch === '"') inString = true;
      else if (ch === '{' || ch === '[') depth += 1;
      else if (ch === '}' || ch === ']') depth = Math.max(0, depth - 1);
    }

    return depth;
  };
};

/**
 * Returns the balanced `{...}` or `[...]` span starting at `start`, or null when the text ends
 * before the span closes.
 */
export const extractBalancedSpan = (text: string, start: number): string | null => {
  const opener = text[start];
  if (opener !== '{' && opener !== '[') return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      depth += 1;
    } else if (ch === '}' || ch === ']') {
      depth -= 1;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
};

const isQuote = (ch: string | undefined): boolean => ch === '"' || ch === "'";
const isSpace = (ch: string | undefined): boolean => ch !== undefined && /\s/.test(ch);
const isEscapeLetter = (ch: string | undefined): boolean =>
  ch === 'n' || ch === 'r' || ch === 't' || ch === '"' || ch === "'";

interface KeyMatch {
  /** Start of the quote and whitespace noise before the field name. */
  position: number;
  valueStart: number;
}

/**
 * Finds `field` used as a key: wrapped in quote and whitespace noise, literal or escaped, with
 * at least one bare quote on each side, then a colon. Each noise run is walked at most twice,
 * so the scan stays linear in the text length.
 */
const findKeyMatches = (text: string, field: StructuredField): KeyMatch[] => {
  const matches: KeyMatch[] = [];
  let from = 0;

  for (;;) {
    const index = text.indexOf(field, from);
    if (index === -1) return matches;
    from = index + field.length;

    let start = index;
    let quotedBefore = false;
    for (;;) {
      const ch = text[start - 1];
      if (text[start - 2] === '\\' && isEscapeLetter(ch)) start -= 2;
      else if (isQuote(ch)) {
        quotedBefore = true;
        start -= 1;
      } else if (isSpace(ch)) start -= 1;
      else break;
    }

    let end = from;
    let quotedAfter = false;
    for (;;) {
      const ch = text[end];
      if (ch === '\\' && isEscapeLetter(text[end + 1])) end += 2;
      else if (isQuote(ch)) {
        quotedAfter = true;
        end += 1;
      } else if (isSpace(ch)) end += 1;
      else break;
    }

    if (!quotedBefore || !quotedAfter || text[end] !== ':') continue;

    let valueStart = end + 1;
    while (isSpace(text[valueStart])) valueStart += 1;
    matches.push({ position: start, valueStart });
  }
};

const decodeSpan = (span: string): JsonValue | undefined => {
  const direct = decodeJson(span);
  if (direct.ok) return direct.value;
  const repaired = decodeJson(repairLiteralControlChars(span));
  return repaired.ok ? repaired.value : undefined;
};

/**
 * Decodes the complete elements of an array whose closing bracket never arrives, as happens
 * when a response is cut off at the token limit. Stops at the first incomplete element.
 */
export const salvageArrayItems = (text: string, start: number): JsonValue[] => {
  const items: JsonValue[] = [];
  let cursor = start + 1;

  while (cursor < text.length) {
    const ch = text[cursor];
    if (ch === ',' || /\s/.test(ch ?? '')) {
      cursor += 1;
      continue;
    }

    const span = extractBalancedSpan(text, cursor);
    if (span === null) break;
    const decoded = decodeSpan(span);
    if (decoded !== undefined) items.push(decoded);
    cursor += span.length;
  }

  return items;
};

interface FieldCandidate {
  value: JsonValue | undefined;
  position: number;
}

const readCandidate = (text: string, field: StructuredField, { position, valueStart }: KeyMatch): FieldCandidate | null => {
  const span = extractBalancedSpan(text, valueStart);
  if (span !== null) return { value: decodeSpan(span), position };

  if (field === 'issues' && text[valueStart] === '[') {
    const items = salvageArrayItems(text, valueStart);
    if (items.length > 0) return { value: items, position };
  }

  return null;
};

/**
 * Candidates for each field, limited to keys at the shallowest depth any structured key
 * appears at, in text order. Keys nested inside another field's value never qualify.
 */
const findFieldCandidates = (text: string): Map<StructuredField, FieldCandidate[]> => {
  const depthAt = createDepthTracker(text);
  const located = STRUCTURED_FIELDS.flatMap((field) => findKeyMatches(text, field).map((match) => ({ field, match })))
    .sort((left, right) => left.match.position - right.match.position)
    .map((entry) => ({ ...entry, depth: depthAt(entry.match.position) }));

  const candidates = new Map<StructuredField, FieldCandidate[]>();
  if (located.length === 0) return candidates;

  const topDepth = located.reduce((lowest, entry) => Math.min(lowest, entry.depth), Number.POSITIVE_INFINITY);
  for (const { field, match, depth } of located) {
    if (depth !== topDepth) continue;
    const candidate = readCandidate(text, field, match);
    if (candidate === null) continue;

    const existing = candidates.get(field);
    if (existing) existing.push(candidate);
    else candidates.set(field, [candidate]);
  }

  return candidates;
};

const hasExpectedShape = (field: StructuredField, value: JsonValue): boolean =>
  field === 'issues' ? Array.isArray(value) : isJsonObject(value);

export type RecoveredFields = Partial<{
  issues: JsonValue[];
  summary: JsonObject;
  drawing_info: JsonObject;
}>;

const assignField = (target: RecoveredFields, field: StructuredField, value: JsonValue): void => {
  if (field === 'issues') {
    if (Array.isArray(value)) target.issues = value;
    return;
  }
  if (isJsonObject(value)) target[field] = value;
};

/**
 * Salvages the top-level structured fields from text that is not valid JSON by decoding the
 * bracketed span after each outermost key independently. Spans that fail to decode are skipped; an
 * unterminated `issues` array keeps whichever of its elements are complete.
 */
export const recoverFieldSpans = (text: string): RecoveredFields => {
  const recovered: RecoveredFields = {};
  const candidates = findFieldCandidates(text);

  for (const field of STRUCTURED_FIELDS) {
    for (const { value } of candidates.get(field) ?? []) {
      if (value === undefined || !hasExpectedShape(field, value)) continue;
      assignField(recovered, field, sanitizeKeys(value));
      break;
    }
  }

  return recovered;
};
