import type { AttemptFailure } from './types';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ProviderTimeoutError extends Error {
  provider: string;
  timeoutMs: number;

  constructor(provider: string, timeoutMs: number) {
    super(`Provider ${provider} did not respond within ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
    this.provider = provider;
    this.timeoutMs = timeoutMs;
  }
}

export class InvalidJsonOutputError extends Error {
  provider: string;

  constructor(provider: string, message: string) {
    super(message);
    this.name = 'InvalidJsonOutputError';
    this.provider = provider;
  }
}

export class GatewayExhaustedError extends Error {
  attemptedProviders: string[];
  lastFailure: AttemptFailure;

  constructor(attemptedProviders: string[], lastFailure: AttemptFailure) {
    super(
      `All providers failed (${attemptedProviders.join(', ')}); ` +
        `last failure from ${lastFailure.provider} [${lastFailure.kind}]: ${lastFailure.message}`
    );
    this.name = 'GatewayExhaustedError';
    this.attemptedProviders = attemptedProviders;
    this.lastFailure = lastFailure;
  }

  get attempts(): number {
    return this.attemptedProviders.length;
  }
}

export class GatewayCancelledError extends Error {
  attemptedProviders: string[];

  constructor(attemptedProviders: string[]) {
    super('Generation cancelled by caller');
    this.name = 'GatewayCancelledError';
    this.attemptedProviders = attemptedProviders;
  }
}
