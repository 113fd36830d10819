import { isJsonObject, type JsonObject, type JsonValue, type RecoveryStatus } from '@aiflow/shared';
import { decodeJson, deepFreeze, describeError, unwrapCodeFence } from './json';
import { recoverFieldSpans } from './recovery';
import { sanitizeKeys } from './sanitize';
import { defaultedFields, shapeFields } from './shape';
import type { StructuredResult } from './types';

export * from './types';
export { cleanKey, sanitizeKeys, type SanitizeOptions } from './sanitize';
export { extractBalancedSpan, recoverFieldSpans, repairLiteralControlChars, salvageArrayItems, type RecoveredFields } from './recovery';
export { shapeFields, validateDrawingInfoField, validateIssuesField, validateSummaryField } from './shape';
export { unwrapCodeFence } from './json';

const LOG_SCOPE = 'structured_output_parse';
const MINIMAL_DIAGNOSTIC = 'Structured output could not be recovered; no decodable issues, summary or drawing_info found.';

const finalize = (fields: {
  issues: JsonValue[];
  summary: JsonObject;
  drawing_info: JsonObject;
  extra: JsonObject;
  recovery_status: RecoveryStatus;
  diagnostic?: string;
}): StructuredResult => {
  deepFreeze(fields.issues);
  deepFreeze(fields.summary);
  deepFreeze(fields.drawing_info);
  deepFreeze(fields.extra);

  return Object.freeze({
    drawing_info: fields.drawing_info,
    issues: fields.issues,
    summary: fields.summary,
    recovery_status: fields.recovery_status,
    issue_count: fields.issues.length,
    extra: fields.extra,
    ...(fields.diagnostic !== undefined ? { diagnostic: fields.diagnostic } : {})
  });
};

/** Terminal fallback: empty literals only. */
export const minimalResult = (diagnostic: string = MINIMAL_DIAGNOSTIC): StructuredResult =>
  finalize({
    issues: [],
    summary: {},
    drawing_info: {},
    extra: {},
    recovery_status: 'minimal',
    diagnostic
  });

const fromDecodedObject = (decoded: JsonObject): StructuredResult => {
  const sanitized = sanitizeKeys(decoded);
  const record = isJsonObject(sanitized) ? sanitized : decoded;
  const shaped = shapeFields(record);

  for (const { field, reason } of defaultedFields(shaped)) {
    console.warn({ scope: LOG_SCOPE, stage: 'shape', field, message: `Defaulted field: ${reason}` });
  }

  return finalize({
    issues: shaped.issues.value,
    summary: shaped.summary.value,
    drawing_info: shaped.drawing_info.value,
    extra: shaped.extra,
    recovery_status: 'ok'
  });
};

const emergencyRecovery = (text: string, failure: string): StructuredResult => {
  try {
    const recovered = recoverFieldSpans(text);
    const recoveredFields = Object.keys(recovered);

    if (recoveredFields.length === 0) {
      console.warn({ scope: LOG_SCOPE, stage: 'recovery', tier: 'minimal', error: failure });
      return minimalResult();
    }

    console.warn({ scope: LOG_SCOPE, stage: 'recovery', tier: 'recovered', fields: recoveredFields, error: failure });
    return finalize({
      issues: recovered.issues ?? [],
      summary: recovered.summary ?? {},
      drawing_info: recovered.drawing_info ?? {},
      extra: {},
      recovery_status: 'recovered',
      diagnostic: `Recovered ${recoveredFields.join(', ')} from malformed output: ${failure}`
    });
  } catch (error) {
    console.error({ scope: LOG_SCOPE, stage: 'recovery', tier: 'minimal', error: describeError(error) });
    return minimalResult();
  }
};

/**
 * Turns raw model output that should be JSON into a {@link StructuredResult}.
 *
 * Well-formed JSON objects have their keys sanitized and their `issues`, `summary` and
 * `drawing_info` members shape-checked (`ok`). Anything else goes through span recovery
 * (`recovered`) and finally to empty defaults (`minimal`). Never throws.
 */
export const parseStructuredOutput = (rawText: string): StructuredResult => {
  try {
    const text = unwrapCodeFence(String(rawText ?? ''));
    const decoded = decodeJson(text);

    if (!decoded.ok) {
      return emergencyRecovery(text, decoded.error);
    }

    if (!isJsonObject(decoded.value)) {
      return emergencyRecovery(text, `top-level value is ${Array.isArray(decoded.value) ? 'an array' : 'not an object'}`);
    }

    return fromDecodedObject(decoded.value);
  } catch (error) {
    console.error({ scope: LOG_SCOPE, stage: 'parse', error: describeError(error) });
    return minimalResult();
  }
};
