import { expect, test } from 'vitest';
import { GatewayExhaustedError } from '../../src/core/errors';
import { InMemoryMetrics } from '../../src/util/metrics';
import { RecordingSink, StubProvider, fail, reply, request, stubGateway } from '../mocks/stubProvider';

test('success emits one record without prompt text', async () => {
  const sink = new RecordingSink();
  const chatty = new StubProvider('p1', reply('NOT JSON'));
  const strict = new StubProvider('p2', reply('{"ok":true}'));
  const gateway = stubGateway({ providers: [chatty, strict], sink });

  await gateway.generate(request({ purpose: 'analyze_ticket', jsonMode: true }));

  expect(sink.events).toEqual([
    {
      outcome: 'success',
      purpose: 'analyze_ticket',
      provider: 'p2',
      model: 'p2-model',
      jsonMode: true,
      systemChars: 28,
      userChars: 21,
      latencyMs: expect.any(Number),
      attempts: 2,
      usedFallback: true,
    },
  ]);
});

test('exhaustion emits the attempted providers and failure kind', async () => {
  const sink = new RecordingSink();
  const first = new StubProvider('p1', fail(new Error('boom')));
  const second = new StubProvider('p2', reply('[]'));
  const gateway = stubGateway({ providers: [first, second], sink });

  await expect(gateway.generate(request({ jsonMode: true }))).rejects.toBeInstanceOf(GatewayExhaustedError);

  expect(sink.events).toEqual([
    {
      outcome: 'exhausted',
      purpose: 'generate',
      jsonMode: true,
      systemChars: 28,
      userChars: 21,
      attempts: 2,
      attemptedProviders: ['p1', 'p2'],
      failureKind: 'invalid_json',
      failureMessage: 'JSON mode requires an object, got array',
    },
  ]);
});

test('a throwing sink does not change the result', async () => {
  const provider = new StubProvider('p1', reply('ok'));
  const gateway = stubGateway({
    providers: [provider],
    sink: {
      record() {
        throw new Error('sink offline');
      },
    },
  });

  const result = await gateway.generate(request());

  expect(result.content).toBe('ok');
});

test('attempt and request counters follow the outcome', async () => {
  const metrics = new InMemoryMetrics();
  const first = new StubProvider('p1', fail(new Error('boom')));
  const second = new StubProvider('p2', reply('ok'));
  const gateway = stubGateway({ providers: [first, second], metrics, sink: new RecordingSink() });

  await gateway.generate(request());

  expect(metrics.counterValue('provider_attempts_total', { provider: 'p1', outcome: 'invocation' })).toBe(1);
  expect(metrics.counterValue('provider_attempts_total', { provider: 'p2', outcome: 'success' })).toBe(1);
  expect(metrics.histogramCount('provider_latency_ms_histogram', { provider: 'p2' })).toBe(1);
});

test('metrics sink counts terminal outcomes when no sink is given', async () => {
  const metrics = new InMemoryMetrics();
  const first = new StubProvider('p1', fail(new Error('boom')));
  const second = new StubProvider('p2', reply('ok'));
  const gateway = stubGateway({ providers: [first, second], metrics });

  await gateway.generate(request());

  expect(metrics.counterValue('gateway_requests_total', { purpose: 'generate', outcome: 'success' })).toBe(1);
  expect(metrics.counterValue('gateway_fallbacks_total', { purpose: 'generate', provider: 'p2' })).toBe(1);
});
