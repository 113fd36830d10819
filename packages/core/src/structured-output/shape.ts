import { isJsonObject, type JsonObject, type JsonValue } from '@aiflow/shared';
import { describeError, describeJsonType } from './json';
import { STRUCTURED_FIELDS, type FieldOutcome, type StructuredField } from './types';

const guardField = <T>(derive: () => FieldOutcome<T>, fallback: () => T): FieldOutcome<T> => {
  try {
    return derive();
  } catch (error) {
    return { kind: 'defaulted', value: fallback(), reason: describeError(error) };
  }
};

const readMember = (record: JsonObject, field: string): JsonValue | undefined =>
  Object.hasOwn(record, field) ? record[field] : undefined;

export const validateIssuesField = (record: JsonObject): FieldOutcome<JsonValue[]> =>
  guardField<JsonValue[]>(
    () => {
      const value = readMember(record, 'issues');
      if (Array.isArray(value)) return { kind: 'valid', value };
      return { kind: 'defaulted', value: [], reason: `expected array, got ${describeJsonType(value)}` };
    },
    () => []
  );

const validateObjectField = (record: JsonObject, field: 'summary' | 'drawing_info'): FieldOutcome<JsonObject> =>
  guardField<JsonObject>(
    () => {
      const value = readMember(record, field);
      if (isJsonObject(value)) return { kind: 'valid', value };
      return { kind: 'defaulted', value: {}, reason: `expected object, got ${describeJsonType(value)}` };
    },
    () => ({})
  );

export const validateSummaryField = (record: JsonObject): FieldOutcome<JsonObject> =>
  validateObjectField(record, 'summary');

export const validateDrawingInfoField = (record: JsonObject): FieldOutcome<JsonObject> =>
  validateObjectField(record, 'drawing_info');

export interface ShapedFields {
  issues: FieldOutcome<JsonValue[]>;
  summary: FieldOutcome<JsonObject>;
  drawing_info: FieldOutcome<JsonObject>;
  extra: JsonObject;
}

const collectExtra = (record: JsonObject): JsonObject => {
  const reserved: ReadonlySet<string> = new Set(STRUCTURED_FIELDS);
  return Object.fromEntries(Object.entries(record).filter(([key]) => !reserved.has(key)));
};

/** Validates each structured field on its own; one field defaulting never affects another. */
export const shapeFields = (record: JsonObject): ShapedFields => ({
  issues: validateIssuesField(record),
  summary: validateSummaryField(record),
  drawing_info: validateDrawingInfoField(record),
  extra: guardField<JsonObject>(() => ({ kind: 'valid', value: collectExtra(record) }), () => ({})).value
});

export const defaultedFields = (shaped: ShapedFields): Array<{ field: StructuredField; reason: string }> =>
  STRUCTURED_FIELDS.flatMap((field) => {
    const outcome = shaped[field];
    return outcome.kind === 'defaulted' ? [{ field, reason: outcome.reason }] : [];
  });
