import type {
  GatewayConfig,
  GenerateOptions,
  GenerateRequest,
  GenerateResponse,
  ObservabilitySink,
  ProviderFactory,
  Purpose,
  PurposeRoute,
  RoutePolicy,
} from './core/types';
import { ProviderRegistry } from './core/registry';
import { validateRoutePolicy } from './core/routePolicy';
import { generate as runGateway } from './core/gateway';
import { combineSinks, createLogSink, createMetricsSink } from './core/observability';
import { DEFAULT_PURPOSE, PURPOSES } from './core/purpose';
import { createOpenAiCompatibleProvider } from './adapters/openAiCompatibleProvider';
import type { Metrics } from './util/metrics';

export type CreateGatewayOptions = {
  sink?: ObservabilitySink;
  metrics?: Metrics;
  providerFactory?: ProviderFactory;
};

export type CompleteParams = {
  purpose?: Purpose;
  systemPrompt: string;
  userPrompt: string;
  temperature?: number;
  jsonMode?: boolean;
  timeoutMs?: number;
  route?: readonly string[];
  signal?: AbortSignal;
};

export type Gateway = {
  readonly registry: ProviderRegistry;
  readonly policy: RoutePolicy;
  generate: (request: GenerateRequest, options?: GenerateOptions) => Promise<GenerateResponse>;
  /** Content only; defaults follow the general-purpose caller. */
  complete: (params: CompleteParams) => Promise<string>;
};

const DEFAULT_TEMPERATURE = 0.7;

function freezePolicy(policy: RoutePolicy): RoutePolicy {
  const purposes: Partial<Record<Purpose, PurposeRoute>> = {};
  for (const purpose of PURPOSES) {
    const route = policy.purposes[purpose];
    if (route) {
      purposes[purpose] = Object.freeze({ ...route, providers: Object.freeze([...route.providers]) });
    }
  }
  return Object.freeze({
    defaultRoute: Object.freeze([...policy.defaultRoute]),
    purposes: Object.freeze(purposes),
  });
}

/**
 * Builds the registry and policy once from resolved configuration. Both are
 * frozen; changing providers or routes means building a new gateway.
 */
export function createGateway(config: GatewayConfig, options: CreateGatewayOptions = {}): Gateway {
  const registry = new ProviderRegistry(
    config.providers,
    options.providerFactory ?? ((providerConfig) => createOpenAiCompatibleProvider(providerConfig))
  );
  const policy = freezePolicy(config.policy);
  validateRoutePolicy(policy, registry);

  const sink =
    options.sink ??
    (options.metrics ? combineSinks(createLogSink(), createMetricsSink(options.metrics)) : createLogSink());
  const deps = { registry, policy, sink, metrics: options.metrics };

  return {
    registry,
    policy,
    generate: (request, generateOptions) => runGateway(request, deps, generateOptions),
    async complete(params) {
      const response = await runGateway(
        {
          purpose: params.purpose ?? DEFAULT_PURPOSE,
          systemPrompt: params.systemPrompt,
          userPrompt: params.userPrompt,
          temperature: params.temperature ?? DEFAULT_TEMPERATURE,
          jsonMode: params.jsonMode ?? false,
          timeoutMs: params.timeoutMs,
        },
        deps,
        { route: params.route, signal: params.signal }
      );
      return response.content;
    },
  };
}

export { loadConfig, buildGatewayConfig } from './core/config';
export { generate, effectiveTimeoutMs, type GatewayDeps } from './core/gateway';
export { ProviderRegistry } from './core/registry';
export { resolveRoute, validateRoutePolicy } from './core/routePolicy';
export { PURPOSES, DEFAULT_PURPOSE, isPurpose, toPurpose } from './core/purpose';
export { parseJsonObject, validateOutput } from './core/evaluator/index';
export { combineSinks, createLogSink, createMetricsSink } from './core/observability';
export {
  ConfigurationError,
  GatewayCancelledError,
  GatewayExhaustedError,
  InvalidJsonOutputError,
  ProviderTimeoutError,
} from './core/errors';
export { ProviderInvocationError, normalizeProviderError, type ProviderErrorType } from './adapters/errors';
export { createOpenAiCompatibleProvider } from './adapters/openAiCompatibleProvider';
export { InMemoryMetrics, type Metrics } from './util/metrics';
export type * from './core/types';
