/**
 * Outbound proxy for the Anthropic and Scopus clients
 */

import type { Logger } from 'pino';
import { ProxyAgent, setGlobalDispatcher } from 'undici';

export function resolveProxyUrl(env: NodeJS.ProcessEnv): string | undefined {
  const candidates = [env.HTTPS_PROXY, env.https_proxy, env.HTTP_PROXY, env.http_proxy];
  return candidates.map(value => value?.trim()).find((value): value is string => Boolean(value));
}

/**
 * Route every fetch through the proxy named in the environment, if any.
 * Returns the proxy host that was configured.
 */
export function configureProxy(env: NodeJS.ProcessEnv, logger: Logger): string | undefined {
  const proxyUrl = resolveProxyUrl(env);
  if (!proxyUrl) {
    return undefined;
  }

  let host: string;
  try {
    host = new URL(proxyUrl).host;
  } catch {
    throw new Error(`Invalid proxy URL in HTTPS_PROXY/HTTP_PROXY: ${proxyUrl.substring(0, 50)}`);
  }

  setGlobalDispatcher(new ProxyAgent(proxyUrl));
  logger.info({ event: 'proxy.configure.success', host }, `Using proxy ${host}`);
  return host;
}
