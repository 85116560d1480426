import { expect, test } from 'vitest';
import { ProviderInvocationError, normalizeProviderError } from '../../src/adapters/errors';
import { GatewayExhaustedError } from '../../src/core/errors';

test('status codes map to error types', () => {
  expect(normalizeProviderError({ statusCode: 429, message: 'slow down' }, 'openai').type).toBe('RATE_LIMIT');
  expect(normalizeProviderError({ statusCode: 402, message: 'pay up' }, 'openai').type).toBe('QUOTA_EXCEEDED');
  expect(normalizeProviderError({ statusCode: 401, message: 'bad key' }, 'openai').type).toBe('AUTH');
  expect(normalizeProviderError({ status: 403, message: 'forbidden' }, 'openai').type).toBe('AUTH');
  expect(normalizeProviderError({ statusCode: 503, message: 'overloaded' }, 'openai').type).toBe('TRANSIENT');
  expect(normalizeProviderError({ statusCode: 400, message: 'bad request' }, 'openai').type).toBe('PERMANENT');
});

test('network failures are transient', () => {
  expect(normalizeProviderError(new TypeError('fetch failed'), 'local').type).toBe('TRANSIENT');
  const refused = Object.assign(new Error('connect failed'), { cause: { code: 'ECONNREFUSED' } });
  expect(normalizeProviderError(refused, 'local').type).toBe('TRANSIENT');
});

test('normalized errors keep provider, status and message', () => {
  const error = normalizeProviderError({ statusCode: 429, message: 'slow down' }, 'deepseek');
  expect(error).toBeInstanceOf(ProviderInvocationError);
  expect(error.provider).toBe('deepseek');
  expect(error.status).toBe(429);
  expect(error.message).toBe('slow down');
});

test('existing invocation errors pass through', () => {
  const original = new ProviderInvocationError('openai', 'AUTH', 'missing key');
  expect(normalizeProviderError(original, 'deepseek')).toBe(original);
});

test('non-object failures become permanent', () => {
  const error = normalizeProviderError('socket hang up', 'local');
  expect(error.type).toBe('PERMANENT');
  expect(error.message).toBe('socket hang up');
});

test('exhaustion message names the chain and the last failure', () => {
  const error = new GatewayExhaustedError(['local', 'deepseek'], {
    kind: 'timeout',
    provider: 'deepseek',
    message: 'Provider deepseek did not respond within 100ms',
  });
  expect(error.attempts).toBe(2);
  expect(error.message).toBe(
    'All providers failed (local, deepseek); last failure from deepseek [timeout]: Provider deepseek did not respond within 100ms'
  );
});
