import type { z } from 'zod';
import type { LlmClient, LlmRequest } from './llm-client.js';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import { AgentError } from '@epirisk/shared/src/utils/errors.js';
import { extractJson } from './json-extraction.js';

const log = createChildLogger('llm:invoke-and-validate');

const DEFAULT_MAX_RETRIES = 1;

export interface InvokeAndValidateOptions<T extends z.ZodTypeAny> {
  readonly llmClient: LlmClient;
  readonly request: LlmRequest;
  readonly schema: T;
  /** Used in logs and in the error raised after the last attempt. */
  readonly operation: string;
  readonly maxRetries?: number;
}

function withCorrection(request: LlmRequest, errors: readonly string[]): LlmRequest {
  return {
    ...request,
    userMessage: `${request.userMessage}\n\n[CORRECTION] Your previous response had validation errors. Respond again with valid JSON that fixes these issues:\n${errors.map((e) => `- ${e}`).join('\n')}`,
  };
}

/**
 * Invokes the model and validates its JSON output, re-prompting with the
 * validation errors up to `maxRetries` times. Transport errors propagate as-is.
 */
export async function invokeAndValidate<T extends z.ZodTypeAny>(
  options: InvokeAndValidateOptions<T>,
): Promise<z.output<T>> {
  const { llmClient, request, schema, operation, maxRetries = DEFAULT_MAX_RETRIES } = options;

  let lastErrors: readonly string[] = [];

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const response = await llmClient.invoke(
      attempt === 0 ? request : withCorrection(request, lastErrors),
    );

    let parsed: unknown;
    try {
      parsed = extractJson(response.content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      lastErrors = [`Failed to parse JSON: ${message}`];
      log.warn({ operation, attempt: attempt + 1, errors: lastErrors }, 'JSON parse failed');
      continue;
    }

    const result = schema.safeParse(parsed);
    if (result.success) {
      // eslint-disable-next-line @typescript-eslint/no-unsafe-return
      return result.data;
    }

    lastErrors = result.error.errors.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`);
    log.warn({ operation, attempt: attempt + 1, errors: lastErrors }, 'Output failed validation');
  }

  throw new AgentError(
    `${operation} returned invalid output after ${String(maxRetries + 1)} attempts: ${lastErrors.join(', ')}`,
  );
}
