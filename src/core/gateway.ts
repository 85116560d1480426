import type {
  AttemptFailure,
  GatewayEvent,
  GenerateOptions,
  GenerateRequest,
  GenerateResponse,
  ObservabilitySink,
  Provider,
  RoutePolicy,
} from './types';
import type { ProviderRegistry } from './registry';
import type { Metrics } from '../util/metrics';
import { purposeTimeoutMs, resolveRoute } from './routePolicy';
import { validateOutput } from './evaluator/index';
import { emitEvent } from './observability';
import {
  ConfigurationError,
  GatewayCancelledError,
  GatewayExhaustedError,
  InvalidJsonOutputError,
  ProviderTimeoutError,
} from './errors';
import { normalizeProviderError } from '../adapters/errors';
import { runWithDeadline } from '../util/deadline';
import { logDebug, logWarn } from '../util/logger';

export type GatewayDeps = {
  registry: ProviderRegistry;
  policy: RoutePolicy;
  sink?: ObservabilitySink;
  metrics?: Metrics;
};

/** Request override, then purpose default, then provider default, else unbounded. */
export function effectiveTimeoutMs(
  request: GenerateRequest,
  provider: Provider,
  policy: RoutePolicy
): number | undefined {
  return request.timeoutMs ?? purposeTimeoutMs(policy, request.purpose) ?? provider.timeoutMs;
}

function checkRequestTimeout(timeoutMs: number | undefined): void {
  if (timeoutMs === undefined) return;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`Request timeoutMs must be a positive number, got ${timeoutMs}`);
  }
}

function toAttemptFailure(error: unknown, provider: string): AttemptFailure {
  if (error instanceof ProviderTimeoutError) {
    return { kind: 'timeout', provider, message: error.message };
  }
  if (error instanceof InvalidJsonOutputError) {
    return { kind: 'invalid_json', provider, message: error.message };
  }
  const normalized = normalizeProviderError(error, provider);
  return { kind: 'invocation', provider, message: `${normalized.type}: ${normalized.message}` };
}

function eventBase(request: GenerateRequest, attempts: number) {
  return {
    purpose: request.purpose,
    jsonMode: request.jsonMode,
    systemChars: request.systemPrompt.length,
    userChars: request.userPrompt.length,
    attempts,
  };
}

/**
 * Tries each provider of the resolved route once, in order, until one
 * returns content that satisfies the request. Individual provider failures
 * never escape; only exhaustion, cancellation and configuration errors do.
 */
export async function generate(
  request: GenerateRequest,
  deps: GatewayDeps,
  options: GenerateOptions = {}
): Promise<GenerateResponse> {
  checkRequestTimeout(request.timeoutMs);
  const route = resolveRoute({
    purpose: request.purpose,
    policy: deps.policy,
    registry: deps.registry,
    override: options.route,
  });

  const attempted: string[] = [];
  let lastFailure: AttemptFailure | undefined;

  const cancel = (): GatewayCancelledError => {
    const event: GatewayEvent = {
      ...eventBase(request, attempted.length),
      outcome: 'cancelled',
      attemptedProviders: [...attempted],
    };
    emitEvent(deps.sink, event);
    return new GatewayCancelledError([...attempted]);
  };

  for (const name of route) {
    if (options.signal?.aborted) throw cancel();

    const provider = deps.registry.get(name);
    if (!provider) {
      throw new ConfigurationError(`Resolved provider is not enabled: ${name}`);
    }

    attempted.push(name);
    const timeoutMs = effectiveTimeoutMs(request, provider, deps.policy);
    const attemptStart = Date.now();
    logDebug('gateway_attempt_start', {
      purpose: request.purpose,
      provider: name,
      attempt: attempted.length,
      timeoutMs,
    });

    try {
      const content = await runWithDeadline(
        (signal) => provider.generate(request, { signal }),
        {
          timeoutMs,
          signal: options.signal,
          onTimeout: () => new ProviderTimeoutError(name, timeoutMs ?? 0),
          onAbort: () => new GatewayCancelledError([...attempted]),
        }
      );
      validateOutput(content, request, name);

      const latencyMs = Date.now() - attemptStart;
      const attempts = attempted.length;
      deps.metrics?.incCounter('provider_attempts_total', { provider: name, outcome: 'success' });
      deps.metrics?.observeHistogram('provider_latency_ms_histogram', latencyMs, { provider: name });

      const response: GenerateResponse = {
        content,
        provider: provider.name,
        model: provider.model,
        latencyMs,
        attempts,
        usedFallback: attempts > 1,
      };
      emitEvent(deps.sink, {
        ...eventBase(request, attempts),
        outcome: 'success',
        provider: response.provider,
        model: response.model,
        latencyMs,
        usedFallback: response.usedFallback,
      });
      return response;
    } catch (error) {
      if (error instanceof GatewayCancelledError || options.signal?.aborted) {
        deps.metrics?.incCounter('provider_attempts_total', { provider: name, outcome: 'cancelled' });
        throw cancel();
      }

      lastFailure = toAttemptFailure(error, name);
      deps.metrics?.incCounter('provider_attempts_total', { provider: name, outcome: lastFailure.kind });
      logWarn('gateway_attempt_failed', {
        purpose: request.purpose,
        provider: name,
        attempt: attempted.length,
        kind: lastFailure.kind,
        error: lastFailure.message,
        elapsedMs: Date.now() - attemptStart,
      });
    }
  }

  if (!lastFailure) {
    // resolveRoute never returns an empty route
    throw new ConfigurationError('Route resolved without any attempt');
  }

  emitEvent(deps.sink, {
    ...eventBase(request, attempted.length),
    outcome: 'exhausted',
    attemptedProviders: [...attempted],
    failureKind: lastFailure.kind,
    failureMessage: lastFailure.message,
  });
  throw new GatewayExhaustedError([...attempted], lastFailure);
}
