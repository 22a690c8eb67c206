/**
 * LLM client for extracting structured facts from paper text
 */

import { z } from 'zod';
import { pino } from 'pino';
import { LlmError, type CompletionRequest, type LlmClient, type LlmClientConfig, type LlmErrorType } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const ANTHROPIC_VERSION = '2023-06-01';

// Zod schema for the Messages API response envelope
const MessageResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

const MAX_WAIT_MS = 10000;

function backoff(baseMs: number, attempt: number): number {
  return Math.min(baseMs * Math.pow(2, attempt), MAX_WAIT_MS);
}

/**
 * Wait for a 429 from its Retry-After seconds, capped at 10s.
 * Missing or non-numeric values (HTTP dates) use `fallbackMs`.
 */
export function retryAfterMs(header: string | null, fallbackMs: number): number {
  const seconds = header ? Number.parseInt(header, 10) : Number.NaN;
  if (Number.isNaN(seconds)) {
    return fallbackMs;
  }
  return Math.min(Math.max(seconds, 0) * 1000, MAX_WAIT_MS);
}

function wait(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Create LLM client
 */
export function createLlmClient(config: LlmClientConfig): LlmClient {
  const {
    provider,
    apiKey,
    baseUrl = 'https://api.anthropic.com/v1',
    model = 'claude-3-haiku-20240307',
    timeout = 60000,
    maxRetries = 3,
    backoffBaseMs = 1000,
    fetch: fetchFn = fetch,
  } = config;

  if (provider !== 'ANTHROPIC') {
    throw new Error(`Unsupported LLM provider: ${provider}`);
  }

  const normalizedBaseUrl = baseUrl.replace(/\/$/, '');

  /**
   * POST with retry on 429/5xx/timeout and structured logging
   */
  async function request(path: string, body: unknown): Promise<unknown> {
    const url = `${normalizedBaseUrl}${path}`;
    const startTime = Date.now();
    let lastError: LlmError | null = null;

    logger.info({ event: 'llm.request.start', model, timeoutMs: timeout, path }, 'Starting LLM API request');

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      let retryReason: LlmErrorType | undefined;
      let waitMs = backoff(backoffBaseMs, attempt);

      try {
        const response = await fetchFn(url, {
          method: 'POST',
          headers: {
            'x-api-key': apiKey,
            'anthropic-version': ANTHROPIC_VERSION,
            'content-type': 'application/json',
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        });

        if (response.status === 429) {
          waitMs = retryAfterMs(response.headers.get('Retry-After'), waitMs);
          retryReason = 'rate_limit';
          lastError = new LlmError('LLM API rate limited: 429', 'rate_limit', 429);
        } else if (response.status >= 500 && response.status < 600) {
          retryReason = 'server_error';
          lastError = new LlmError(
            `LLM API error: ${response.status} ${response.statusText}`,
            'server_error',
            response.status
          );
        } else if (response.status === 401 || response.status === 403) {
          await response.text().catch(() => '');
          throw new LlmError(
            `LLM API authentication error: ${response.status} ${response.statusText}`,
            'auth',
            response.status
          );
        } else if (!response.ok) {
          await response.text().catch(() => '');
          throw new LlmError(`LLM API error: ${response.status} ${response.statusText}`, 'api_error', response.status);
        } else {
          let data: unknown;
          try {
            data = await response.json();
          } catch {
            throw new LlmError('LLM API returned a non-JSON body', 'invalid_response', response.status);
          }

          logger.info(
            { event: 'llm.request.success', durationMs: Date.now() - startTime, attempt: attempt + 1 },
            'LLM API request succeeded'
          );
          return data;
        }
      } catch (error: unknown) {
        if (error instanceof LlmError) {
          logger.error(
            {
              event: 'llm.request.fail',
              durationMs: Date.now() - startTime,
              errorType: error.errorType,
              statusCode: error.statusCode,
              attempt: attempt + 1,
            },
            'LLM API request failed'
          );
          throw error;
        }
        if (isAbortError(error)) {
          retryReason = 'timeout';
          lastError = new LlmError('LLM API request timeout', 'timeout', 408);
        } else {
          retryReason = 'network';
          lastError = new LlmError(
            `LLM API network error: ${error instanceof Error ? error.message : String(error)}`,
            'network'
          );
        }
      } finally {
        clearTimeout(timeoutId);
      }

      if (attempt < maxRetries) {
        logger.info(
          { event: 'llm.request.retry', attempt: attempt + 1, reason: retryReason, waitMs },
          `Retrying LLM request in ${waitMs}ms`
        );
        await wait(waitMs);
      }
    }

    const finalError = lastError ?? new LlmError('Request failed after retries', 'network');
    logger.error(
      {
        event: 'llm.request.fail',
        durationMs: Date.now() - startTime,
        errorType: finalError.errorType,
        statusCode: finalError.statusCode,
        attempt: maxRetries + 1,
      },
      'LLM API request failed after retries'
    );
    throw finalError;
  }

  return {
    async complete({ prompt, maxTokens = 2000, temperature = 0 }: CompletionRequest): Promise<string> {
      const data = await request('/messages', {
        model,
        max_tokens: maxTokens,
        temperature,
        messages: [{ role: 'user', content: prompt }],
      });

      const parsed = MessageResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new LlmError(
          `Unexpected LLM response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
          'invalid_response'
        );
      }

      const { usage } = parsed.data;
      logger.debug(
        { event: 'llm.usage', inputTokens: usage?.input_tokens, outputTokens: usage?.output_tokens },
        'LLM token usage'
      );

      return parsed.data.content
        .filter(block => block.type === 'text')
        .map(block => block.text ?? '')
        .join('');
    },
  };
}
