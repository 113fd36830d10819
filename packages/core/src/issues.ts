import {
  isJsonObject,
  issueCategorySchema,
  issueRecordSchema,
  issueStatusSchema,
  type IssueCategory,
  type IssueRecord,
  type IssueStatus,
  type IssueSummary,
  type JsonObject,
  type JsonValue,
  type RecoveryStatus
} from '@aiflow/shared';

const toNonEmptyString = (value: JsonValue | undefined): string | undefined => {
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
};

const firstString = (item: JsonObject, keys: string[]): string | undefined => {
  for (const key of keys) {
    const found = toNonEmptyString(item[key]);
    if (found) return found;
  }
  return undefined;
};

const matchCategory = (value: JsonValue | undefined): IssueCategory | undefined => {
  const normalized = toNonEmptyString(value)?.toLowerCase();
  if (!normalized) return undefined;
  return issueCategorySchema.options.find((category) => category.toLowerCase() === normalized);
};

const matchStatus = (value: JsonValue | undefined): IssueStatus => {
  const parsed = issueStatusSchema.safeParse(toNonEmptyString(value)?.toLowerCase());
  return parsed.success ? parsed.data : 'pending';
};

const toTags = (value: JsonValue | undefined): string[] | undefined => {
  if (!Array.isArray(value)) return undefined;
  const tags = value
    .map((entry) => toNonEmptyString(entry))
    .filter((entry): entry is string => typeof entry === 'string');
  return tags.length > 0 ? tags : undefined;
};

const toSerialNumber = (value: JsonValue | undefined, fallback: number): number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 1 ? value : fallback;

/**
 * Maps model-shaped issue objects onto {@link IssueRecord}. Accepts `severity` for `category`,
 * `issue_observed` for `description` and `pid_reference` for `location`; categories are
 * matched case-insensitively and default to `Observation`. Entries that are not objects are dropped.
 */
export const normalizeIssues = (issues: readonly JsonValue[]): IssueRecord[] => {
  const normalized: IssueRecord[] = [];

  for (const item of issues) {
    if (!isJsonObject(item)) continue;

    const candidate = {
      serial_number: toSerialNumber(item.serial_number, normalized.length + 1),
      category: matchCategory(item.category) ?? matchCategory(item.severity) ?? 'Observation',
      description: firstString(item, ['description', 'issue_observed', 'issue']) ?? 'Description not provided',
      location: firstString(item, ['location', 'pid_reference']),
      tags: toTags(item.tags),
      reference_standard: firstString(item, ['reference_standard']),
      action_required: firstString(item, ['action_required', 'recommendation']),
      status: matchStatus(item.status)
    };

    const parsed = issueRecordSchema.safeParse(candidate);
    if (!parsed.success) {
      console.warn({
        scope: 'issue_normalization',
        serialNumber: candidate.serial_number,
        error: parsed.error.message
      });
      continue;
    }

    normalized.push(parsed.data);
  }

  return normalized;
};

export const summarizeIssues = (issues: readonly IssueRecord[]): IssueSummary => {
  const summary: IssueSummary = {
    total_issues: issues.length,
    critical_count: 0,
    major_count: 0,
    minor_count: 0,
    observation_count: 0,
    approved_count: 0,
    ignored_count: 0,
    pending_count: 0
  };

  for (const issue of issues) {
    if (issue.status === 'approved') summary.approved_count += 1;
    else if (issue.status === 'ignored') summary.ignored_count += 1;
    else summary.pending_count += 1;

    if (issue.category === 'Critical') summary.critical_count += 1;
    else if (issue.category === 'Major') summary.major_count += 1;
    else if (issue.category === 'Minor') summary.minor_count += 1;
    else summary.observation_count += 1;
  }

  return summary;
};

export type ConfidenceLevel = 'Very High' | 'High' | 'Good' | 'Moderate';

export const scoreConfidence = (issues: readonly IssueRecord[]): ConfidenceLevel => {
  let score = 0.7;
  if (issues.length >= 5) score += 0.1;
  if (issues.length >= 10) score += 0.1;

  const detailed = issues.filter((issue) => issue.description.length > 50).length;
  if (issues.length > 0 && detailed > issues.length * 0.7) score += 0.1;

  // Tenths avoid float drift (0.7 + 0.1 + 0.1 < 0.9).
  const tenths = Math.round(score * 10);
  if (tenths >= 9) return 'Very High';
  if (tenths >= 8) return 'High';
  if (tenths >= 7) return 'Good';
  return 'Moderate';
};

export interface IssueCountPolicy {
  minIssues: number;
  strict: boolean;
}

export interface IssueCountEvaluation {
  issueCount: number;
  minIssues: number;
  mode: 'strict' | 'flexible';
  satisfied: boolean;
  accepted: boolean;
  recoveryStatus: RecoveryStatus;
}

/**
 * Applies the minimum-issue policy on top of a parse result. Flexible mode never rejects;
 * strict mode accepts only when the count reaches the minimum.
 */
export const evaluateIssueCount = (
  result: { issue_count: number; recovery_status: RecoveryStatus },
  policy: IssueCountPolicy
): IssueCountEvaluation => {
  const satisfied = result.issue_count >= policy.minIssues;
  return {
    issueCount: result.issue_count,
    minIssues: policy.minIssues,
    mode: policy.strict ? 'strict' : 'flexible',
    satisfied,
    accepted: policy.strict ? satisfied : true,
    recoveryStatus: result.recovery_status
  };
};
