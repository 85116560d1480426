import type { Purpose, RoutePolicy } from './types';
import type { ProviderRegistry } from './registry';
import { ConfigurationError } from './errors';

/** Names listed more than once, in first-repeat order. */
export function repeatedNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) repeated.add(name);
    seen.add(name);
  }
  return [...repeated];
}

export type ResolveRouteParams = {
  purpose: Purpose;
  policy: RoutePolicy;
  registry: ProviderRegistry;
  override?: readonly string[];
};

/**
 * Ordered provider names to try for one request. The policy is declared
 * intent; disabled providers are dropped here, keeping relative order.
 */
export function resolveRoute({ purpose, policy, registry, override }: ResolveRouteParams): string[] {
  const purposeRoute = policy.purposes[purpose];
  let candidates: readonly string[];
  let source: string;

  if (override) {
    const unknown = override.filter((name) => !registry.isRegistered(name));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Route override references unknown provider(s): ${unknown.join(', ')}`);
    }
    const repeated = repeatedNames(override);
    if (repeated.length > 0) {
      throw new ConfigurationError(`Route override repeats provider(s): ${repeated.join(', ')}`);
    }
    candidates = override;
    source = 'override';
  } else if (purposeRoute) {
    candidates = purposeRoute.providers;
    source = `purpose ${purpose}`;
  } else {
    candidates = policy.defaultRoute;
    source = 'default route';
  }

  const resolved = candidates.filter((name) => registry.isEnabled(name));
  if (resolved.length === 0) {
    throw new ConfigurationError(`No enabled provider for ${source} (candidates: ${candidates.join(', ') || 'none'})`);
  }
  return resolved;
}

export function purposeTimeoutMs(policy: RoutePolicy, purpose: Purpose): number | undefined {
  return policy.purposes[purpose]?.timeoutMs;
}

/** Fails fast on names that no provider config declares and on names listed twice. */
export function validateRoutePolicy(policy: RoutePolicy, registry: ProviderRegistry): void {
  if (policy.defaultRoute.length === 0) {
    throw new ConfigurationError('Default route must name at least one provider');
  }

  const routes: Array<[string, readonly string[]]> = [['default', policy.defaultRoute]];
  for (const [purpose, route] of Object.entries(policy.purposes)) {
    if (route) routes.push([purpose, route.providers]);
  }

  for (const [label, names] of routes) {
    const repeated = repeatedNames(names);
    if (repeated.length > 0) {
      throw new ConfigurationError(`Route ${label} repeats provider: ${repeated.join(', ')}`);
    }
    for (const name of names) {
      if (!registry.isRegistered(name)) {
        throw new ConfigurationError(`Route ${label} references unknown provider: ${name}`);
      }
    }
  }
}
