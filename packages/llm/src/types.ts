/**
 * Types for the LLM fact extraction client
 */

export type LlmErrorType =
  | 'timeout'
  | 'rate_limit'
  | 'server_error'
  | 'auth'
  | 'api_error'
  | 'invalid_response'
  | 'network';

export class LlmError extends Error {
  constructor(
    message: string,
    readonly errorType: LlmErrorType,
    readonly statusCode?: number
  ) {
    super(message);
    this.name = 'LlmError';
  }
}

export interface LlmClientConfig {
  provider: 'ANTHROPIC';
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeout?: number;
  maxRetries?: number;
  backoffBaseMs?: number; // first retry wait, doubled per attempt, capped at 10s
  fetch?: typeof fetch;
}

export interface CompletionRequest {
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LlmClient {
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * Species observation fields, all strings as they go straight to CSV
 */
export interface SpeciesFact {
  species: string;
  abundance_or_biomass: string;
  number: string;
  location: string;
}
