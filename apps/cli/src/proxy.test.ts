import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { configureProxy, resolveProxyUrl } from './proxy.js';

const logger = pino({ level: 'silent' });

describe('resolveProxyUrl', () => {
  it('prefers HTTPS_PROXY and skips blank values', () => {
    expect(resolveProxyUrl({ HTTPS_PROXY: ' http://proxy.test:8080 ', HTTP_PROXY: 'http://other.test:3128' })).toBe(
      'http://proxy.test:8080'
    );
    expect(resolveProxyUrl({ HTTPS_PROXY: '  ', http_proxy: 'http://other.test:3128' })).toBe('http://other.test:3128');
    expect(resolveProxyUrl({})).toBeUndefined();
  });
});

describe('configureProxy', () => {
  it('does nothing without a proxy', () => {
    expect(configureProxy({}, logger)).toBeUndefined();
  });

  it('rejects a malformed proxy URL', () => {
    expect(() => configureProxy({ HTTPS_PROXY: 'not a url' }, logger)).toThrow(
      'Invalid proxy URL in HTTPS_PROXY/HTTP_PROXY: not a url'
    );
  });
});
