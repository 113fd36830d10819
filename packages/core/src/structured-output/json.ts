import { isJsonObject, type JsonValue } from '@aiflow/shared';
import type { DecodeOutcome } from './types';

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const toJsonValue = (value: unknown): JsonValue => {
  if (value === null) return null;

  switch (typeof value) {
    // Out-of-range literals such as 1e400 decode to Infinity and are kept as decoded.
    case 'string':
    case 'boolean':
    case 'number':
      return value;
    case 'object': {
      if (Array.isArray(value)) {
        return value.map((item: unknown) => toJsonValue(item));
      }
      const entries = Object.entries(value).map(([key, item]): [string, JsonValue] => [key, toJsonValue(item)]);
      return Object.fromEntries(entries);
    }
    default:
      return null;
  }
};

export const decodeJson = (text: string): DecodeOutcome => {
  try {
    const parsed: unknown = JSON.parse(text);
    return { ok: true, value: toJsonValue(parsed) };
  } catch (error) {
    return { ok: false, error: describeError(error) };
  }
};

export const describeJsonType = (value: JsonValue | undefined): string => {
  if (value === undefined) return 'missing';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
};

export const deepFreeze = (value: JsonValue): void => {
  if (Array.isArray(value)) {
    value.forEach((item) => deepFreeze(item));
    Object.freeze(value);
    return;
  }

  if (isJsonObject(value)) {
    Object.values(value).forEach((item) => deepFreeze(item));
    Object.freeze(value);
  }
};

const FENCE_PATTERN = /^```(?:json)?[^\S\n]*\n?([\s\S]*?)\n?```\s*$/i;
const OPEN_FENCE_PATTERN = /^```(?:json)?[^\S\n]*\n?([\s\S]*)$/i;

/**
 * Returns the body of a markdown code fence wrapping the whole response, or the text as given.
 * An opening fence without its closing one (a truncated response) is also unwrapped.
 */
export const unwrapCodeFence = (raw: string): string => {
  const trimmed = raw.trim();
  if (!trimmed.startsWith('```')) return raw;

  const closed = trimmed.match(FENCE_PATTERN);
  if (closed) return closed[1] ?? '';

  const open = trimmed.match(OPEN_FENCE_PATTERN);
  return open?.[1] ?? raw;
};
