export const analysisSystemPrompt =
  'You are a senior multidisciplinary engineering reviewer specialising in P&ID design verification.';

export interface AnalysisPromptOptions {
  minIssues: number;
  context?: string;
}

const outputContract = [
  'Return a single JSON object with exactly these top-level keys:',
  '- "drawing_info": { "drawing_number", "drawing_title", "revision", "project", "client" } as read from the title block.',
  '- "issues": an array of objects with "serial_number", "pid_reference", "issue_observed", "action_required",',
  '  "severity" (one of "critical", "major", "minor", "observation"), "category" and "status" ("pending").',
  '- "summary": { "total_issues", "critical_count", "major_count", "minor_count", "observation_count" }.',
  'Do not wrap the JSON in markdown fences and do not add commentary outside it.'
];

const reviewInstructions = (minIssues: number): string[] => [
  'Review the attached drawing sheets as one integrated process system.',
  'Read every visible tag, line number, equipment datasheet and note before judging.',
  'Check control loops for completeness and fail-safe action, relief devices against design pressure,',
  'line numbering and specification breaks, and instrument alarm hierarchy (LL < L < H < HH).',
  'Verify against ISA-5.1, API 520/521, API 14C and ASME B31.3 where applicable.',
  'Report only issues you can tie to a specific tag or location on the drawing; no generic placeholders.',
  `Aim for at least ${minIssues} distinct, well-evidenced issues when the drawing supports them.`,
  'Calibrate severity with engineering judgment: a blocked relief path is critical, a missing label usually is not.'
];

/**
 * Drawing review instruction sent with the sheet images. Reference context, when present,
 * is placed ahead of the instruction together with guidance to cross-check against it.
 */
export const buildAnalysisPrompt = ({ minIssues, context }: AnalysisPromptOptions): string => {
  const base = [...reviewInstructions(minIssues), '', ...outputContract].join('\n');
  const trimmedContext = context?.trim();

  if (!trimmedContext) {
    return base;
  }

  return [
    'REFERENCE CONTEXT FROM ENGINEERING STANDARDS:',
    '',
    trimmedContext,
    '',
    '---',
    '',
    base,
    '',
    'Use the reference context above to sharpen the review and call out deviations from it.'
  ].join('\n');
};
