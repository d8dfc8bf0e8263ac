import type { LlmConfig } from '@epirisk/schemas/src/app-config.schema.js';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import { ConfigurationError, LlmError } from '@epirisk/shared/src/utils/errors.js';
import { detectHedges } from '../scoring/hedge-detector.js';
import { extractJson } from './json-extraction.js';

const log = createChildLogger('llm:client');

const MAX_TRANSIENT_RETRIES = 3;
const BASE_DELAY_MS = 1000;

export const CLAIM_EXTRACTION_MARKER = 'claim extractor';

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly jsonSchema?: object;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

const OPINION_PREFIX = /^(?:i think|i believe|in my opinion|personally)\b/i;

interface MockClaim {
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly confidence: number;
  readonly isFactual: boolean;
}

/** One claim per sentence, with offsets into the answer. */
export function splitSentences(answerText: string): readonly MockClaim[] {
  const claims: MockClaim[] = [];
  let cursor = 0;

  for (const piece of answerText.split(/(?<=[.!?])\s+/)) {
    const text = piece.trim().replace(/[.!?]+$/, '');
    if (text.length === 0) continue;

    const start = answerText.indexOf(text, cursor);
    cursor = start + text.length;
    claims.push({
      text,
      start,
      end: start + text.length,
      confidence: detectHedges(text).length > 0 ? 0.6 : 0.9,
      isFactual: !OPINION_PREFIX.test(text),
    });
  }

  return claims;
}

function createMockResponse(request: LlmRequest): string {
  if (request.systemPrompt.toLowerCase().includes(CLAIM_EXTRACTION_MARKER)) {
    return JSON.stringify({ claims: splitSentences(request.userMessage) });
  }
  return JSON.stringify({ result: 'Mock LLM response' });
}

function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ userMessageLength: request.userMessage.length }, 'Mock LLM invocation');

      return Promise.resolve({
        content: createMockResponse(request),
        tokenUsage: { input: request.userMessage.length, output: 50 },
      });
    },
  };
}

function numericField(error: Error, field: 'status' | 'statusCode'): number | undefined {
  if (!(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'number' ? value : undefined;
}

const TRANSIENT_PATTERNS = [
  '429',
  'rate limit',
  'too many requests',
  '500',
  '502',
  '503',
  'internal server error',
  'bad gateway',
  'service unavailable',
  'econnreset',
  'etimedout',
  'timeout',
  'network',
  'socket hang up',
  'econnrefused',
];

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = numericField(error, 'status') ?? numericField(error, 'statusCode');
  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((pattern) => message.includes(pattern));
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function computeBackoffMs(attempt: number): number {
  return BASE_DELAY_MS * Math.pow(2, attempt) + Math.random() * BASE_DELAY_MS;
}

async function createVertexClient(config: LlmConfig): Promise<LlmClient> {
  const projectId = process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? config.location;

  if (!projectId) {
    throw new ConfigurationError(
      'GCP_PROJECT_ID environment variable is required for Vertex AI LLM client',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: config.model,
    location,
    temperature: config.temperature,
    authOptions: { projectId },
    responseMimeType: 'application/json',
  });

  log.info({ projectId, location, model: config.model }, 'Using Vertex AI LLM client');

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ userMessageLength: request.userMessage.length }, 'Vertex AI LLM invocation');

      let lastError: Error | undefined;

      for (let attempt = 0; attempt < MAX_TRANSIENT_RETRIES; attempt++) {
        try {
          const response = await model.invoke([
            ['system', request.systemPrompt],
            ['human', request.userMessage],
          ]);

          const rawContent =
            typeof response.content === 'string'
              ? response.content
              : JSON.stringify(response.content);

          return {
            content: JSON.stringify(extractJson(rawContent)),
            tokenUsage: response.usage_metadata
              ? {
                  input: response.usage_metadata.input_tokens,
                  output: response.usage_metadata.output_tokens,
                }
              : undefined,
          };
        } catch (error) {
          lastError = error instanceof Error ? error : new Error(String(error));

          if (!isTransientError(error)) {
            throw new LlmError(
              `Vertex AI invocation failed: ${lastError.message}`,
              false,
              lastError,
            );
          }

          log.warn(
            { attempt: attempt + 1, maxRetries: MAX_TRANSIENT_RETRIES, error: lastError.message },
            'Transient LLM error, retrying',
          );

          if (attempt < MAX_TRANSIENT_RETRIES - 1) {
            await sleep(computeBackoffMs(attempt));
          }
        }
      }

      throw new LlmError(
        `Vertex AI invocation failed after ${String(MAX_TRANSIENT_RETRIES)} retries: ${lastError?.message ?? 'unknown error'}`,
        true,
        lastError,
      );
    },
  };
}

export async function createLlmClient(config: LlmConfig): Promise<LlmClient> {
  if (config.provider === 'mock' || process.env['EPIRISK_MOCK_LLM'] === 'true') {
    return createMockClient();
  }

  return createVertexClient(config);
}
