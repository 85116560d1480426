import type { Provider, ProviderConfig, ProviderFactory } from './types';
import { ConfigurationError } from './errors';

export class ProviderRegistry {
  private readonly configs: ReadonlyMap<string, ProviderConfig>;
  private readonly providers: ReadonlyMap<string, Provider>;

  constructor(configs: readonly ProviderConfig[], factory: ProviderFactory) {
    const byName = new Map<string, ProviderConfig>();
    const instances = new Map<string, Provider>();

    for (const config of configs) {
      if (!config.name) {
        throw new ConfigurationError('Provider name must not be empty');
      }
      if (byName.has(config.name)) {
        throw new ConfigurationError(`Duplicate provider name: ${config.name}`);
      }
      byName.set(config.name, Object.freeze({ ...config }));
      if (config.enabled) {
        instances.set(config.name, factory(config));
      }
    }

    this.configs = byName;
    this.providers = instances;
  }

  isRegistered(name: string): boolean {
    return this.configs.has(name);
  }

  isEnabled(name: string): boolean {
    return this.providers.has(name);
  }

  get(name: string): Provider | undefined {
    return this.providers.get(name);
  }

  config(name: string): ProviderConfig | undefined {
    return this.configs.get(name);
  }

  registeredNames(): string[] {
    return [...this.configs.keys()];
  }

  enabledNames(): string[] {
    return [...this.providers.keys()];
  }
}
