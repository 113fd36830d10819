export type ProviderName = 'openai';
export type MessageRole = 'system' | 'user' | 'assistant';

const DEFAULT_TIMEOUT_MS = 25_000;
const DEFAULT_RETRY_DELAY_MS = 2_000;

interface JsonRecord {
  [key: string]: unknown;
}

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const asNumber = (value: unknown): number | undefined => (typeof value === 'number' ? value : undefined);

const parseJson = (raw: string): unknown => {
  if (!raw) return null;
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw;
  }
};

const providerStatusRetryable = (status: number): boolean =>
  status === 408 || status === 409 || status === 425 || status === 429 || status >= 500;

const extractErrorDetails = (payload: unknown): { message?: string; code?: string } => {
  if (!isRecord(payload)) return {};

  const nestedError = payload.error;
  if (isRecord(nestedError)) {
    return {
      message: asString(nestedError.message) ?? asString(payload.message),
      code: asString(nestedError.code) ?? asString(nestedError.type) ?? asString(payload.code)
    };
  }

  return {
    message: asString(payload.message),
    code: asString(payload.code)
  };
};

const isAbortError = (error: unknown): boolean =>
  error instanceof DOMException ? error.name === 'AbortError' : false;

export type MessageContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string; detail?: 'low' | 'high' | 'auto' } };

export interface ChatMessage {
  role: MessageRole;
  content: string | MessageContentPart[];
}

export interface ProviderUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface GenerateTextParams {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  responseFormat?: 'text' | 'json_object';
  timeoutMs?: number;
}

export interface GenerateTextResult {
  text: string;
  usage?: ProviderUsage;
}

export interface EmbedParams {
  model: string;
  inputs: string[];
  timeoutMs?: number;
}

export interface EmbedResult {
  vectors: number[][];
}

export interface LLMProvider {
  readonly name: ProviderName;
  generateText(input: GenerateTextParams): Promise<GenerateTextResult>;
  embed(input: EmbedParams): Promise<EmbedResult>;
}

export class ProviderRequestError extends Error {
  readonly provider: ProviderName;
  readonly model: string;
  readonly status: number | null;
  readonly code?: string;
  readonly retryable: boolean;

  constructor(params: {
    message: string;
    provider: ProviderName;
    model: string;
    status: number | null;
    retryable: boolean;
    code?: string;
    cause?: unknown;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'ProviderRequestError';
    this.provider = params.provider;
    this.model = params.model;
    this.status = params.status;
    this.code = params.code;
    this.retryable = params.retryable;
  }
}

interface RequestJsonInput {
  provider: ProviderName;
  model: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs?: number;
}

const requestJson = async (input: RequestJsonInput): Promise<unknown> => {
  const controller = new AbortController();
  const timeoutMs = input.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(input.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...input.headers
      },
      body: JSON.stringify(input.body),
      signal: controller.signal
    });

    const rawBody = await response.text();
    const payload = parseJson(rawBody);

    if (!response.ok) {
      const details = extractErrorDetails(payload);
      const status = response.status;
      throw new ProviderRequestError({
        provider: input.provider,
        model: input.model,
        status,
        code: details.code,
        retryable: providerStatusRetryable(status),
        message: details.message ?? `${input.provider} request failed with status ${status}`
      });
    }

    return payload;
  } catch (error) {
    if (error instanceof ProviderRequestError) {
      throw error;
    }

    if (isAbortError(error)) {
      throw new ProviderRequestError({
        provider: input.provider,
        model: input.model,
        status: null,
        code: 'TIMEOUT',
        retryable: true,
        message: `${input.provider} request timed out after ${timeoutMs}ms`,
        cause: error
      });
    }

    throw new ProviderRequestError({
      provider: input.provider,
      model: input.model,
      status: null,
      code: 'NETWORK_ERROR',
      retryable: true,
      message: `${input.provider} request failed before response`,
      cause: error
    });
  } finally {
    clearTimeout(timer);
  }
};

const parseUsage = (usage: unknown): ProviderUsage | undefined => {
  if (!isRecord(usage)) return undefined;

  const inputTokens = asNumber(usage.prompt_tokens);
  const outputTokens = asNumber(usage.completion_tokens);
  const totalTokens = asNumber(usage.total_tokens);

  if (inputTokens === undefined && outputTokens === undefined && totalTokens === undefined) {
    return undefined;
  }

  return {
    inputTokens,
    outputTokens,
    totalTokens
  };
};

const parseOpenAIText = (payload: unknown): string => {
  if (!isRecord(payload)) return '';
  const choices = payload.choices;
  if (!Array.isArray(choices) || choices.length === 0 || !isRecord(choices[0])) return '';
  const message = choices[0].message;
  if (!isRecord(message)) return '';

  const content = message.content;
  if (typeof content === 'string') return content;

  if (Array.isArray(content)) {
    return content
      .map((part) => (isRecord(part) ? asString(part.text) : undefined))
      .filter((part): part is string => typeof part === 'string')
      .join('\n');
  }

  return '';
};

const parseOpenAIEmbeddings = (payload: unknown): number[][] => {
  if (!isRecord(payload) || !Array.isArray(payload.data)) {
    throw new Error('OpenAI embeddings response missing data array');
  }

  return payload.data.map((item, index) => {
    if (!isRecord(item) || !Array.isArray(item.embedding)) {
      throw new Error(`OpenAI embeddings response item ${index} missing embedding`);
    }

    return item.embedding.map((value) => {
      if (typeof value !== 'number') {
        throw new Error(`OpenAI embeddings response item ${index} has non-numeric value`);
      }
      return value;
    });
  });
};

const trimTrailingSlash = (input: string): string => input.replace(/\/+$/, '');

/** Wraps base64 PNG data as a high-detail image part. */
export const pngImagePart = (base64: string): MessageContentPart => ({
  type: 'image_url',
  image_url: { url: `data:image/png;base64,${base64}`, detail: 'high' }
});

export interface OpenAIProviderConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class OpenAIProvider implements LLMProvider {
  readonly name: ProviderName = 'openai';

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs?: number;

  constructor(config: OpenAIProviderConfig) {
    if (!config.apiKey.trim()) {
      throw new Error('OpenAIProvider requires a non-empty apiKey');
    }
    this.apiKey = config.apiKey;
    this.baseUrl = trimTrailingSlash(config.baseUrl ?? 'https://api.openai.com/v1');
    this.timeoutMs = config.timeoutMs;
  }

  async generateText(input: GenerateTextParams): Promise<GenerateTextResult> {
    const payload = await requestJson({
      provider: this.name,
      model: input.model,
      url: `${this.baseUrl}/chat/completions`,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: {
        model: input.model,
        messages: input.messages.map((message) => ({ role: message.role, content: message.content })),
        temperature: input.temperature,
        max_tokens: input.maxTokens,
        ...(input.responseFormat ? { response_format: { type: input.responseFormat } } : {})
      },
      timeoutMs: input.timeoutMs ?? this.timeoutMs
    });

    return {
      text: parseOpenAIText(payload),
      usage: isRecord(payload) ? parseUsage(payload.usage) : undefined
    };
  }

  async embed(input: EmbedParams): Promise<EmbedResult> {
    const payload = await requestJson({
      provider: this.name,
      model: input.model,
      url: `${this.baseUrl}/embeddings`,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: {
        model: input.model,
        input: input.inputs
      },
      timeoutMs: input.timeoutMs ?? this.timeoutMs
    });

    return { vectors: parseOpenAIEmbeddings(payload) };
  }
}

export interface RetryLog {
  attempt: number;
  attempts: number;
  delayMs: number;
  status: number | null;
  error: string;
}

export interface RetryOptions {
  attempts: number;
  baseDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (entry: RetryLog) => void;
}

export interface RetryResult<T> {
  result: T;
  /** 1-based number of the attempt that succeeded. */
  attempt: number;
}

const normalizeLogError = (error: unknown): { status: number | null; message: string } => {
  if (error instanceof ProviderRequestError) {
    return { status: error.status, message: error.message };
  }

  if (error instanceof Error) {
    return { status: null, message: error.message };
  }

  return { status: null, message: 'Unknown provider error' };
};

const defaultShouldRetry = (error: unknown): boolean =>
  error instanceof ProviderRequestError ? error.retryable : true;

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `task` up to `attempts` times, waiting `(attempt + 1) * baseDelayMs` after each failure.
 * `task` receives the zero-based attempt index. Non-retryable errors are rethrown at once.
 */
export const executeWithRetry = async <T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> => {
  const attempts = Math.max(1, options.attempts);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const shouldRetry = options.shouldRetry ?? defaultShouldRetry;
  const onRetry = options.onRetry ?? ((entry: RetryLog) => console.warn({ scope: 'provider_retry', ...entry }));

  let lastError: unknown = null;

  for (let attempt = 0; attempt < attempts; attempt += 1) {
    try {
      return { result: await task(attempt), attempt: attempt + 1 };
    } catch (error) {
      lastError = error;
      if (attempt === attempts - 1 || !shouldRetry(error)) break;

      const delayMs = (attempt + 1) * baseDelayMs;
      const normalized = normalizeLogError(error);
      onRetry({ attempt: attempt + 1, attempts, delayMs, status: normalized.status, error: normalized.message });
      await sleep(delayMs);
    }
  }

  throw lastError;
};
