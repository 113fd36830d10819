import {
  analysisSystemPrompt,
  buildAnalysisPrompt,
  evaluateIssueCount,
  normalizeIssues,
  parseStructuredOutput,
  scoreConfidence,
  summarizeIssues,
  type ConfidenceLevel,
  type IssueCountEvaluation
} from '@aiflow/core';
import {
  executeWithRetry,
  pngImagePart,
  type GenerateTextResult,
  type LLMProvider,
  type MessageContentPart
} from '@aiflow/providers';
import type { CitationEntry } from '@aiflow/rag';
import type { IssueRecord, IssueSummary, JsonObject, RecoveryStatus } from '@aiflow/shared';
import { z } from 'zod';
import type { AnalyzerConfig } from './config';
import type { ReferenceLibrary } from './references/library';

export class AnalysisTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Drawing analysis timed out after ${timeoutMs}ms`);
    this.name = 'AnalysisTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export const withTimeout = async <T>(work: Promise<T>, timeoutMs: number): Promise<T> => {
  let timer: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      work,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => reject(new AnalysisTimeoutError(timeoutMs)), timeoutMs);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

export const analysisRequestSchema = z.object({
  /** Base64-encoded PNG pages, in sheet order. */
  images: z.array(z.string().trim().min(1)).min(1),
  drawingNumber: z.string().trim().default('')
});

export type AnalysisRequest = z.input<typeof analysisRequestSchema>;

export type AnalysisConfig = Pick<AnalyzerConfig, 'analysisModel' | 'issuePolicy' | 'generation' | 'analysisTimeoutMs'>;

export interface AnalysisDependencies {
  provider: Pick<LLMProvider, 'generateText'>;
  /** Omitted when reference retrieval is disabled. */
  library?: Pick<ReferenceLibrary, 'retrieveContext'>;
  config: AnalysisConfig;
}

export interface AnalysisMetadata {
  model: string;
  processingTimeMs: number;
  confidence: ConfidenceLevel;
  ragContextUsed: boolean;
  ragContextLength: number;
  ragCitations: CitationEntry[];
  /** 1-based attempt that produced the response. */
  attempt: number;
  temperature: number;
  pageCount: number;
  tokensUsed: number | null;
  issuePolicy: IssueCountEvaluation;
}

export interface DrawingAnalysis {
  drawing_info: JsonObject;
  issues: IssueRecord[];
  summary: IssueSummary;
  /** The model's own summary object, when it returned a non-empty one. */
  model_summary?: JsonObject;
  recovery_status: RecoveryStatus;
  diagnostic?: string;
  metadata: AnalysisMetadata;
}

const TEMPERATURE_STEP = 0.05;

export const temperatureForAttempt = (base: number, attempt: number): number =>
  Number((base + attempt * TEMPERATURE_STEP).toFixed(2));

const withDrawingDefaults = (drawingInfo: JsonObject, drawingNumber: string): JsonObject => ({
  drawing_number: drawingNumber,
  drawing_title: 'P&ID Drawing',
  revision: 'Unknown',
  ...drawingInfo
});

interface Generation {
  response: GenerateTextResult;
  attempt: number;
  temperature: number;
  context: string;
  citations: CitationEntry[];
}

const generate = async (
  request: z.output<typeof analysisRequestSchema>,
  deps: AnalysisDependencies
): Promise<Generation> => {
  const { config } = deps;
  const retrieved =
    deps.library && request.drawingNumber
      ? await deps.library.retrieveContext(request.drawingNumber)
      : { context: '', citations: [] };

  const prompt = buildAnalysisPrompt({ minIssues: config.issuePolicy.minIssues, context: retrieved.context });
  const content: MessageContentPart[] = [{ type: 'text', text: prompt }, ...request.images.map(pngImagePart)];

  const { result, attempt } = await executeWithRetry(
    (index) =>
      deps.provider.generateText({
        model: config.analysisModel,
        messages: [
          { role: 'system', content: analysisSystemPrompt },
          { role: 'user', content }
        ],
        temperature: temperatureForAttempt(config.generation.temperature, index),
        maxTokens: config.generation.maxTokens,
        responseFormat: 'json_object'
      }),
    {
      attempts: config.generation.retryAttempts,
      baseDelayMs: config.generation.retryDelayMs,
      onRetry: (entry) => console.warn({ scope: 'analysis_generation', drawingNumber: request.drawingNumber, ...entry })
    }
  );

  return {
    response: result,
    attempt,
    temperature: temperatureForAttempt(config.generation.temperature, attempt - 1),
    context: retrieved.context,
    citations: retrieved.citations
  };
};

/**
 * Reviews one drawing: optional reference retrieval, a vision call with retry, then
 * structured-output recovery and issue normalization. Rejects with
 * {@link AnalysisTimeoutError} when the whole run exceeds `analysisTimeoutMs`.
 */
export const analyzeDrawing = async (input: AnalysisRequest, deps: AnalysisDependencies): Promise<DrawingAnalysis> => {
  const request = analysisRequestSchema.parse(input);
  const { config } = deps;
  const startedAt = Date.now();

  const generation = await withTimeout(generate(request, deps), config.analysisTimeoutMs);
  const parsed = parseStructuredOutput(generation.response.text);

  const issuePolicy = evaluateIssueCount(parsed, config.issuePolicy);
  const policyLog = { scope: 'analysis_issue_policy', drawingNumber: request.drawingNumber, ...issuePolicy };
  if (issuePolicy.satisfied) console.info(policyLog);
  else console.warn(policyLog);

  const issues = normalizeIssues(parsed.issues);
  const hasModelSummary = Object.keys(parsed.summary).length > 0;

  console.info({
    scope: 'analysis_generation',
    drawingNumber: request.drawingNumber,
    attempt: generation.attempt,
    issues: issues.length,
    recoveryStatus: parsed.recovery_status
  });

  return {
    drawing_info: withDrawingDefaults(parsed.drawing_info, request.drawingNumber),
    issues,
    summary: summarizeIssues(issues),
    ...(hasModelSummary ? { model_summary: parsed.summary } : {}),
    recovery_status: parsed.recovery_status,
    ...(parsed.diagnostic !== undefined ? { diagnostic: parsed.diagnostic } : {}),
    metadata: {
      model: config.analysisModel,
      processingTimeMs: Date.now() - startedAt,
      confidence: scoreConfidence(issues),
      ragContextUsed: generation.context.length > 0,
      ragContextLength: generation.context.length,
      ragCitations: generation.citations,
      attempt: generation.attempt,
      temperature: generation.temperature,
      pageCount: request.images.length,
      tokensUsed: generation.response.usage?.totalTokens ?? null,
      issuePolicy
    }
  };
};
