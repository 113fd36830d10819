import { describe, expect, it } from 'vitest';
import type { IssueRecord } from '@aiflow/shared';
import {
  buildAnalysisPrompt,
  evaluateIssueCount,
  normalizeIssues,
  scoreConfidence,
  summarizeIssues
} from '../index';

const makeIssues = (count: number, description: string): IssueRecord[] =>
  Array.from({ length: count }, (_, index): IssueRecord => ({
    serial_number: index + 1,
    category: 'Minor',
    description,
    status: 'pending'
  }));

const LONG_DESCRIPTION = 'Control valve FCV-101 has no fail position marked and no bypass arrangement shown.';

describe('normalizeIssues', () => {
  it('maps model field names onto issue records and drops non-objects', () => {
    const issues = normalizeIssues([
      {
        serial_number: 3,
        pid_reference: 'PSV-101',
        issue_observed: 'Relief discharge routed to atmosphere',
        action_required: 'Route to flare header',
        severity: 'critical',
        category: 'Safety',
        status: 'pending'
      },
      'stray text',
      { description: 'Missing tag on drain valve', category: 'minor', status: 'APPROVED', tags: ['ISA-5.1', '', 5] },
      { issue: 'Line spec break not flagged', severity: 'unknown' }
    ]);

    expect(issues).toEqual([
      {
        serial_number: 3,
        category: 'Critical',
        description: 'Relief discharge routed to atmosphere',
        location: 'PSV-101',
        action_required: 'Route to flare header',
        status: 'pending'
      },
      {
        serial_number: 2,
        category: 'Minor',
        description: 'Missing tag on drain valve',
        tags: ['ISA-5.1'],
        status: 'approved'
      },
      {
        serial_number: 3,
        category: 'Observation',
        description: 'Line spec break not flagged',
        status: 'pending'
      }
    ]);
  });

  it('fills a placeholder description when none is given', () => {
    expect(normalizeIssues([{ severity: 'major' }])).toEqual([
      { serial_number: 1, category: 'Major', description: 'Description not provided', status: 'pending' }
    ]);
  });
});

describe('summarizeIssues', () => {
  it('counts categories and review statuses', () => {
    const summary = summarizeIssues([
      { serial_number: 1, category: 'Critical', description: 'a', status: 'pending' },
      { serial_number: 2, category: 'Minor', description: 'b', status: 'approved' },
      { serial_number: 3, category: 'Observation', description: 'c', status: 'ignored' },
      { serial_number: 4, category: 'Critical', description: 'd', status: 'pending' }
    ]);

    expect(summary).toEqual({
      total_issues: 4,
      critical_count: 2,
      major_count: 0,
      minor_count: 1,
      observation_count: 1,
      approved_count: 1,
      ignored_count: 1,
      pending_count: 2
    });
  });
});

describe('scoreConfidence', () => {
  it('grows with issue count and description detail', () => {
    expect(scoreConfidence([])).toBe('Good');
    expect(scoreConfidence(makeIssues(4, LONG_DESCRIPTION))).toBe('High');
    expect(scoreConfidence(makeIssues(5, 'short'))).toBe('High');
    expect(scoreConfidence(makeIssues(10, 'short'))).toBe('Very High');
    expect(scoreConfidence(makeIssues(10, LONG_DESCRIPTION))).toBe('Very High');
  });
});

describe('evaluateIssueCount', () => {
  it('never rejects in flexible mode', () => {
    expect(evaluateIssueCount({ issue_count: 3, recovery_status: 'ok' }, { minIssues: 10, strict: false })).toEqual({
      issueCount: 3,
      minIssues: 10,
      mode: 'flexible',
      satisfied: false,
      accepted: true,
      recoveryStatus: 'ok'
    });
  });

  it('accepts only satisfied counts in strict mode', () => {
    const policy = { minIssues: 10, strict: true };

    expect(evaluateIssueCount({ issue_count: 3, recovery_status: 'recovered' }, policy).accepted).toBe(false);
    expect(evaluateIssueCount({ issue_count: 12, recovery_status: 'ok' }, policy).accepted).toBe(true);
  });
});

describe('buildAnalysisPrompt', () => {
  it('states the minimum issue target', () => {
    const prompt = buildAnalysisPrompt({ minIssues: 10 });

    expect(prompt).toContain('Aim for at least 10 distinct, well-evidenced issues');
    expect(prompt.startsWith('Review the attached drawing sheets')).toBe(true);
  });

  it('places reference context ahead of the instruction', () => {
    const prompt = buildAnalysisPrompt({ minIssues: 5, context: '  [STANDARD: API 520]\nRelief sizing basis  ' });

    expect(prompt.startsWith('REFERENCE CONTEXT FROM ENGINEERING STANDARDS:\n\n[STANDARD: API 520]\nRelief sizing basis\n\n---\n\n')).toBe(
      true
    );
  });

  it('ignores whitespace-only context', () => {
    expect(buildAnalysisPrompt({ minIssues: 5, context: ' \n ' })).toBe(buildAnalysisPrompt({ minIssues: 5 }));
  });
});
