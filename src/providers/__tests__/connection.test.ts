import { describe, expect, it } from 'vitest';
import { httpStatusOf, isConnectionError } from '../connection.js';

describe('isConnectionError', () => {
  it('should recognize an undici fetch failure', () => {
    expect(isConnectionError(new TypeError('fetch failed'))).toBe(true);
  });

  it('should follow the cause chain to a system error code', () => {
    const root = Object.assign(new Error('getaddrinfo ENOTFOUND api.openai.com'), { code: 'ENOTFOUND' });
    const wrapped = new Error('request failed', { cause: new Error('socket', { cause: root }) });

    expect(isConnectionError(wrapped)).toBe(true);
  });

  it('should recognize SDK connection errors by name', () => {
    const timeout = Object.assign(new Error('Request timed out.'), { name: 'APIConnectionTimeoutError' });

    expect(isConnectionError(timeout)).toBe(true);
  });

  it('should not treat HTTP errors as connection failures', () => {
    expect(isConnectionError(Object.assign(new Error('rate limited'), { status: 429 }))).toBe(false);
    expect(isConnectionError('ECONNREFUSED')).toBe(false);
  });
});

describe('httpStatusOf', () => {
  it('should read either status property', () => {
    expect(httpStatusOf(Object.assign(new Error('x'), { status: 429 }))).toBe(429);
    expect(httpStatusOf(Object.assign(new Error('x'), { status_code: 404 }))).toBe(404);
    expect(httpStatusOf(new Error('x'))).toBeUndefined();
  });
});
