/**
 * Scopus REST API client
 *
 * Features:
 * - Retry logic with exponential backoff (429, 5xx, timeouts)
 * - 30s request timeout
 * - Structured logging (no secrets)
 * - 400/404 treated as "no accessible data"
 */

import { pino } from 'pino';
import { toAbstract, toReferencePapers, toScopusId, toSearchPapers } from './mapping.js';
import {
  ScopusError,
  type ScopusAbstract,
  type ScopusClient,
  type ScopusClientConfig,
  type ScopusPaper,
} from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const NO_DATA_STATUSES = new Set([400, 404]);

function truncate(text: string): string {
  return text.length > 500 ? `${text.substring(0, 500)}...` : text;
}

const MAX_WAIT_MS = 10000;

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

export function isNoDataError(error: unknown): error is ScopusError {
  return error instanceof ScopusError && error.statusCode !== undefined && NO_DATA_STATUSES.has(error.statusCode);
}

/**
 * Create a Scopus REST API client
 */
export function createScopusClient(config: ScopusClientConfig): ScopusClient {
  const {
    apiKey,
    baseUrl = 'https://api.elsevier.com',
    timeout = 30000,
    maxRetries = 3,
    backoffBaseMs = 1000,
    referenceCount = 20,
    maxReferences = 10,
    fetch: fetchFn = fetch,
  } = config;

  const normalizedBaseUrl = baseUrl.replace(/\/$/, '');

  /**
   * GET with retry logic
   */
  async function request(path: string, params: Record<string, string | number>): Promise<unknown> {
    const query = new URLSearchParams(Object.entries(params).map<[string, string]>(([key, value]) => [key, String(value)]));
    const url = `${normalizedBaseUrl}${path}?${query.toString()}`;
    const startTime = Date.now();
    let lastError: ScopusError | null = null;

    logger.debug({ event: 'scopus.request.start', path }, 'Scopus request');

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      let waitMs = Math.min(backoffBaseMs * Math.pow(2, attempt), MAX_WAIT_MS);
      let retryable = false;

      try {
        const response = await fetchFn(url, {
          method: 'GET',
          headers: {
            'X-ELS-APIKey': apiKey,
            Accept: 'application/json',
          },
          signal: controller.signal,
        });

        let responseText: string;
        try {
          responseText = await response.text();
        } catch {
          responseText = '';
        }

        if (response.status === 429 || (response.status >= 500 && response.status < 600)) {
          if (response.status === 429) {
            waitMs = retryAfterMs(response.headers.get('Retry-After'), waitMs);
          }
          retryable = true;
          lastError = new ScopusError(
            `Scopus API error: ${response.status} ${response.statusText}`,
            response.status,
            truncate(responseText)
          );
        } else if (!response.ok) {
          const kind = response.status === 401 || response.status === 403 ? 'authentication error' : 'error';
          throw new ScopusError(
            `Scopus API ${kind}: ${response.status} ${response.statusText}`,
            response.status,
            truncate(responseText)
          );
        } else {
          try {
            const data: unknown = JSON.parse(responseText || '{}');
            logger.debug(
              { event: 'scopus.request.success', path, status: response.status, durationMs: Date.now() - startTime },
              'Scopus request succeeded'
            );
            return data;
          } catch (parseError) {
            throw new ScopusError(
              `Failed to parse Scopus API response as JSON: ${parseError instanceof Error ? parseError.message : 'Unknown error'}`,
              response.status,
              truncate(responseText)
            );
          }
        }
      } catch (error: unknown) {
        if (error instanceof ScopusError) {
          logger.info(
            {
              event: 'scopus.request.fail',
              path,
              status: error.statusCode,
              durationMs: Date.now() - startTime,
              message: error.message,
            },
            'Scopus request failed'
          );
          throw error;
        }
        retryable = true;
        lastError =
          error instanceof Error && error.name === 'AbortError'
            ? new ScopusError(`Scopus API request timeout (${timeout / 1000}s)`, 408)
            : new ScopusError(`Scopus API network error: ${error instanceof Error ? error.message : String(error)}`);
      } finally {
        clearTimeout(timeoutId);
      }

      if (retryable && attempt < maxRetries) {
        logger.info(
          { event: 'scopus.request.retry', path, status: lastError?.statusCode, attempt: attempt + 1, waitMs },
          'Retrying Scopus request'
        );
        await wait(waitMs);
      }
    }

    const finalError = lastError ?? new ScopusError('Request failed after retries');
    logger.warn(
      {
        event: 'scopus.request.fail',
        path,
        status: finalError.statusCode,
        durationMs: Date.now() - startTime,
        message: finalError.message,
      },
      'Scopus request failed after retries'
    );
    throw finalError;
  }

  async function findScopusId(doi: string): Promise<string | undefined> {
    const data = await request('/content/search/scopus', {
      query: `DOI("${doi}")`,
      count: 1,
      field: 'dc:identifier',
    });
    return toScopusId(data);
  }

  return {
    /**
     * GET /content/search/scopus?query=DOI("...")
     */
    findScopusId,

    /**
     * GET /content/abstract/scopus_id/:id/references
     * Returns [] when the paper is unknown or its references are not accessible
     */
    async getReferences(doi: string): Promise<ScopusPaper[]> {
      try {
        const scopusId = await findScopusId(doi);
        if (!scopusId) {
          return [];
        }

        const data = await request(`/content/abstract/scopus_id/${encodeURIComponent(scopusId)}/references`, {
          count: referenceCount,
        });
        const papers = toReferencePapers(data, maxReferences);

        logger.info(
          { event: 'scopus.references.success', doi, scopusId, count: papers.length },
          `Extracted ${papers.length} references`
        );
        return papers;
      } catch (error: unknown) {
        if (isNoDataError(error)) {
          logger.info(
            { event: 'scopus.references.unavailable', doi, statusCode: error.statusCode },
            'Paper has no accessible references'
          );
          return [];
        }
        throw error;
      }
    },

    /**
     * GET /content/search/scopus?query=TITLE-ABS-KEY("...") AND ...
     */
    async searchByTerms(terms: string[], limit: number): Promise<ScopusPaper[]> {
      if (terms.length === 0) {
        return [];
      }
      try {
        const data = await request('/content/search/scopus', {
          query: terms.map(term => `TITLE-ABS-KEY("${term}")`).join(' AND '),
          count: limit,
          sort: 'relevancy',
          field: 'dc:title,prism:doi',
        });
        return toSearchPapers(data);
      } catch (error: unknown) {
        if (isNoDataError(error)) {
          return [];
        }
        throw error;
      }
    },

    /**
     * Title and abstract for a DOI, undefined when Scopus has neither
     */
    async getAbstract(doi: string): Promise<ScopusAbstract | undefined> {
      try {
        const data = await request('/content/search/scopus', {
          query: `DOI("${doi}")`,
          count: 1,
          field: 'dc:title,dc:description,dc:creator',
        });
        return toAbstract(data);
      } catch (error: unknown) {
        if (isNoDataError(error)) {
          return undefined;
        }
        throw error;
      }
    },
  };
}
