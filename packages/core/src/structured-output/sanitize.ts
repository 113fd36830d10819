import type { JsonObject, JsonValue } from '@aiflow/shared';
import { describeError } from './json';

const KEY_EDGE_PATTERN = /^[ \t\n\r"']+|[ \t\n\r"']+$/g;

/**
 * Strips whitespace and quote characters from both ends of a key until nothing changes,
 * so `'\n "\tdrawing_info" '` resolves to `drawing_info`.
 */
export const cleanKey = (key: string): string => {
  let current = key;
  for (;;) {
    const next = current.replace(KEY_EDGE_PATTERN, '');
    if (next === current) return current;
    current = next;
  }
};

export interface SanitizeOptions {
  cleanKey?: (key: string) => string;
  onKeyDropped?: (rawKey: string) => void;
}

interface ResolvedSanitizeOptions {
  cleanKey: (key: string) => string;
  onKeyDropped: (rawKey: string) => void;
}

const logDroppedKey = (rawKey: string): void => {
  console.warn({
    scope: 'structured_output_sanitize',
    key: JSON.stringify(rawKey),
    message: 'Dropped key that is empty after sanitization.'
  });
};

const sanitizeObject = (value: JsonObject, options: ResolvedSanitizeOptions): JsonObject => {
  const entries: Array<[string, JsonValue]> = [];

  for (const [rawKey, child] of Object.entries(value)) {
    try {
      const key = options.cleanKey(rawKey);
      if (!key) {
        options.onKeyDropped(rawKey);
        continue;
      }
      entries.push([key, sanitizeValue(child, options)]);
    } catch (error) {
      console.error({
        scope: 'structured_output_sanitize',
        key: JSON.stringify(rawKey),
        error: describeError(error)
      });

      try {
        entries.push([rawKey, child]);
      } catch (fallbackError) {
        console.error({
          scope: 'structured_output_sanitize',
          key: JSON.stringify(rawKey),
          error: describeError(fallbackError),
          message: 'Skipped entry.'
        });
      }
    }
  }

  return Object.fromEntries(entries);
};

const sanitizeValue = (value: JsonValue, options: ResolvedSanitizeOptions): JsonValue => {
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item, options));
  }

  if (value !== null && typeof value === 'object') {
    return sanitizeObject(value, options);
  }

  return value;
};

/**
 * Rewrites every mapping key at any depth with {@link cleanKey}. Keys that clean to the empty
 * string are dropped. Never throws: on an unexpected failure the input is returned unchanged.
 */
export const sanitizeKeys = (value: JsonValue, options: SanitizeOptions = {}): JsonValue => {
  const resolved: ResolvedSanitizeOptions = {
    cleanKey: options.cleanKey ?? cleanKey,
    onKeyDropped: options.onKeyDropped ?? logDroppedKey
  };

  try {
    return sanitizeValue(value, resolved);
  } catch (error) {
    console.error({
      scope: 'structured_output_sanitize',
      error: describeError(error),
      message: 'Key sanitization failed; returning input unchanged.'
    });
    return value;
  }
};
