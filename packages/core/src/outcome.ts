/**
 * Collaborator call outcomes
 */

import type { Outcome } from './types.js';

export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === 'string' ? error : JSON.stringify(error));
}

/**
 * Run a collaborator call and classify its result. Never rejects.
 */
export async function settle<T>(call: () => Promise<T>, isEmpty: (value: T) => boolean): Promise<Outcome<T>> {
  try {
    const value = await call();
    return isEmpty(value) ? { kind: 'empty' } : { kind: 'ok', value };
  } catch (error: unknown) {
    return { kind: 'failed', error: toError(error) };
  }
}

/**
 * Resolves after `ms`, or as soon as the signal aborts
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
