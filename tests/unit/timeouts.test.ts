import { expect, test } from 'vitest';
import { effectiveTimeoutMs } from '../../src/core/gateway';
import type { RoutePolicy } from '../../src/core/types';
import { StubProvider, reply, request, stubGateway } from '../mocks/stubProvider';

const policy: RoutePolicy = {
  defaultRoute: ['cloud'],
  purposes: { propose_fields_only: { providers: ['local', 'cloud'], timeoutMs: 15000 } },
};

const local = new StubProvider('local', reply('ok'), { timeoutMs: 8000 });
const cloud = new StubProvider('cloud', reply('ok'));

test('request override wins', () => {
  expect(effectiveTimeoutMs(request({ purpose: 'propose_fields_only', timeoutMs: 50 }), local, policy)).toBe(50);
});

test('purpose default beats provider default', () => {
  expect(effectiveTimeoutMs(request({ purpose: 'propose_fields_only' }), local, policy)).toBe(15000);
});

test('provider default applies when nothing else is set', () => {
  expect(effectiveTimeoutMs(request({ purpose: 'analyze_ticket' }), local, policy)).toBe(8000);
});

test('unbounded when no level sets a timeout', () => {
  expect(effectiveTimeoutMs(request(), cloud, policy)).toBeUndefined();
});

test.each([0, -5, Number.NaN])('request timeout %s is refused before any provider is called', async (timeoutMs) => {
  const provider = new StubProvider('cloud', reply('ok'));
  const gateway = stubGateway({ providers: [provider] });

  await expect(gateway.generate(request({ timeoutMs }))).rejects.toThrow(
    `Request timeoutMs must be a positive number, got ${timeoutMs}`
  );
  expect(provider.calls).toBe(0);
});
