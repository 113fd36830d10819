import type { JsonObject, JsonValue, RecoveryStatus } from '@aiflow/shared';

export const STRUCTURED_FIELDS = ['issues', 'summary', 'drawing_info'] as const;

export type StructuredField = (typeof STRUCTURED_FIELDS)[number];

export interface StructuredResult {
  readonly drawing_info: JsonObject;
  readonly issues: JsonValue[];
  readonly summary: JsonObject;
  readonly recovery_status: RecoveryStatus;
  readonly issue_count: number;
  /** Sanitized top-level members other than the three structured fields. */
  readonly extra: JsonObject;
  readonly diagnostic?: string;
}

export type FieldOutcome<T> =
  | { kind: 'valid'; value: T }
  | { kind: 'defaulted'; value: T; reason: string };

export type DecodeOutcome = { ok: true; value: JsonValue } | { ok: false; error: string };
