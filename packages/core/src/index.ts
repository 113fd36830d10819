export * from './structured-output';
export {
  evaluateIssueCount,
  normalizeIssues,
  scoreConfidence,
  summarizeIssues,
  type ConfidenceLevel,
  type IssueCountEvaluation,
  type IssueCountPolicy
} from './issues';
export { analysisSystemPrompt, buildAnalysisPrompt, type AnalysisPromptOptions } from './prompts';
