import axios, { AxiosRequestConfig } from 'axios';
import { config } from '../config';
import { logger } from '../utils/logger';
import { HttpError } from '../utils/errors';
import { formatError } from '../utils/helpers';
import { recordScoringLatency } from '../utils/metrics';
import { CircuitBreaker, CircuitOpenError, RetryPolicy, guardedCall } from '../db/resilience';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionPayload {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  response_format: { type: 'json_object' };
}

export interface JobFit {
  jobTitle: string;
  fitPercentage: number;
}

export interface AtsScore {
  atsScore: number;
  feedback: string;
  improvements: string[];
  jobFit: JobFit | null;
}

export type HttpPost = (url: string, body: unknown, requestConfig: AxiosRequestConfig) => Promise<{ data: unknown }>;

export interface AtsServiceOptions {
  apiUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  retry: RetryPolicy;
  breaker: CircuitBreaker;
  post?: HttpPost;
  sleep?: (ms: number) => Promise<void>;
}

const SYSTEM_PROMPT = `You are an expert ATS (Applicant Tracking System) analyzer. Your task is to:
1. Analyze the given resume
2. Provide a score from 0-100
3. Give brief feedback
4. List specific improvements
5. Add predicted job fit based on the resume with percentage of getting selected
Format your response exactly as a JSON object:
{
  "ats_score": <number between 0-100>,
  "feedback": "<single sentence summary>",
  "improvements": ["point 1", "point 2", "point 3"],
  "job_fit": {
    "job_title": "<most suitable job title>",
    "fit_percentage": <number between 0-100>
  }
}`;

const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

const RETRYABLE_NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNABORTED',
  'EAI_AGAIN',
  'ERR_NETWORK',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Network failures and throttling/server-side HTTP statuses from the scoring API
 */
export function isRetryableScoringError(error: unknown): boolean {
  if (!isRecord(error)) return false;

  const { code, response } = error;
  if (typeof code === 'string' && RETRYABLE_NETWORK_CODES.has(code)) return true;

  if (isRecord(response) && typeof response.status === 'number') {
    return RETRYABLE_STATUS_CODES.has(response.status);
  }

  return false;
}

function clampScore(value: unknown): number {
  const numeric = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  if (!Number.isFinite(numeric)) {
    throw new Error(`score is not a number: ${String(value)}`);
  }
  return Math.max(0, Math.min(100, Math.trunc(numeric)));
}

function parseJobFit(value: unknown): JobFit | null {
  if (!isRecord(value)) return null;
  const { job_title: jobTitle, fit_percentage: fitPercentage } = value;
  if (typeof jobTitle !== 'string') return null;
  return { jobTitle, fitPercentage: clampScore(fitPercentage) };
}

export function createAtsPrompt(textContent: string, model: string = config.ats.model): ChatCompletionPayload {
  return {
    model,
    messages: [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: `Analyze this resume:\n${textContent}` },
    ],
    temperature: 0.7,
    max_tokens: 1000,
    response_format: { type: 'json_object' },
  };
}

/**
 * Pull the scoring JSON out of a chat-completions response
 */
export function parseApiResponse(result: unknown): AtsScore {
  try {
    const choices = isRecord(result) ? result.choices : undefined;
    const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
    const message = isRecord(first) ? first.message : undefined;
    const content = isRecord(message) ? message.content : undefined;

    if (typeof content !== 'string') {
      throw new Error('response has no message content');
    }

    const parsed: unknown = JSON.parse(content.trim());
    if (!isRecord(parsed)) {
      throw new Error('message content is not a JSON object');
    }

    const missing = ['ats_score', 'feedback', 'improvements'].filter((key) => !(key in parsed));
    if (missing.length > 0) {
      throw new Error(`Missing required fields in API response: ${missing.join(', ')}`);
    }

    const { feedback, improvements } = parsed;
    if (typeof feedback !== 'string') {
      throw new Error('feedback must be a string');
    }

    return {
      atsScore: clampScore(parsed.ats_score),
      feedback,
      improvements: Array.isArray(improvements) ? improvements.map((item) => String(item)) : [String(improvements)],
      jobFit: parseJobFit(parsed.job_fit),
    };
  } catch (error) {
    throw new HttpError(502, `Invalid API response format: ${formatError(error)}`, { cause: error });
  }
}

export class AtsService {
  private readonly options: AtsServiceOptions;
  private readonly post: HttpPost;

  constructor(options: AtsServiceOptions) {
    this.options = options;
    this.post = options.post ?? ((url, body, requestConfig) => axios.post(url, body, requestConfig));
  }

  get circuitBreaker(): CircuitBreaker {
    return this.options.breaker;
  }

  async callScoringApi(payload: ChatCompletionPayload): Promise<unknown> {
    const { apiUrl, apiKey, timeoutMs, retry, breaker, sleep } = this.options;

    if (!apiKey.trim()) {
      throw new HttpError(500, 'ATS scoring API key is not configured');
    }

    const response = await guardedCall(
      breaker,
      'ATS scoring',
      retry,
      () =>
        this.post(apiUrl, payload, {
          headers: {
            Authorization: `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
          },
          timeout: timeoutMs,
        }),
      { isTransient: isRetryableScoringError, sleep }
    );

    return response.data;
  }

  async checkAtsScore(textContent: string): Promise<AtsScore> {
    const startTime = Date.now();

    try {
      const payload = createAtsPrompt(textContent, this.options.model);
      const result = await this.callScoringApi(payload);
      const score = parseApiResponse(result);

      recordScoringLatency('success', Date.now() - startTime);
      return score;
    } catch (error) {
      recordScoringLatency('failure', Date.now() - startTime);
      logger.error(`[ATS] Scoring failed: ${formatError(error)}`);

      if (error instanceof CircuitOpenError || error instanceof HttpError) {
        throw error;
      }
      throw new HttpError(502, `An error occurred while requesting ATS score: ${formatError(error)}`, {
        cause: error,
      });
    }
  }
}

export const atsCircuitBreaker = new CircuitBreaker({
  name: 'ats-scoring',
  maxFailures: config.ats.circuitBreaker.maxFailures,
  cooldownMs: config.ats.circuitBreaker.cooldownMs,
});

// Singleton instance
export const atsService = new AtsService({
  apiUrl: config.ats.apiUrl,
  apiKey: config.ats.apiKey,
  model: config.ats.model,
  timeoutMs: config.ats.timeoutMs,
  retry: config.ats.retry,
  breaker: atsCircuitBreaker,
});
