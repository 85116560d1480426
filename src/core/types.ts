import type { Purpose } from './purpose';

export type { Purpose } from './purpose';

export type GenerateRequest = {
  readonly purpose: Purpose;
  readonly systemPrompt: string;
  readonly userPrompt: string;
  readonly temperature: number;
  readonly jsonMode: boolean;
  readonly timeoutMs?: number;
};

export type GenerateResponse = {
  readonly content: string;
  readonly provider: string;
  readonly model: string;
  /** Duration of the winning attempt only. */
  readonly latencyMs: number;
  readonly attempts: number;
  readonly usedFallback: boolean;
};

export type GenerateOptions = {
  /** Used verbatim (minus disabled providers) instead of the purpose route. */
  route?: readonly string[];
  signal?: AbortSignal;
};

export type ProviderConfig = {
  readonly name: string;
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly model: string;
  readonly enabled: boolean;
  readonly timeoutMs?: number;
};

export type ProviderCallOptions = {
  signal: AbortSignal;
};

export type Provider = {
  readonly name: string;
  readonly model: string;
  readonly timeoutMs?: number;
  generate: (request: GenerateRequest, options: ProviderCallOptions) => Promise<string>;
};

export type ProviderFactory = (config: ProviderConfig) => Provider;

export type PurposeRoute = {
  readonly providers: readonly string[];
  readonly timeoutMs?: number;
};

export type RoutePolicy = {
  readonly defaultRoute: readonly string[];
  readonly purposes: Readonly<Partial<Record<Purpose, PurposeRoute>>>;
};

export type GatewayConfig = {
  readonly providers: readonly ProviderConfig[];
  readonly policy: RoutePolicy;
};

export type FailureKind = 'timeout' | 'invocation' | 'invalid_json';

export type AttemptFailure = {
  kind: FailureKind;
  provider: string;
  message: string;
};

type EventBase = {
  purpose: Purpose;
  jsonMode: boolean;
  systemChars: number;
  userChars: number;
  attempts: number;
};

export type GatewayEvent =
  | (EventBase & {
      outcome: 'success';
      provider: string;
      model: string;
      latencyMs: number;
      usedFallback: boolean;
    })
  | (EventBase & {
      outcome: 'exhausted';
      attemptedProviders: string[];
      failureKind: FailureKind;
      failureMessage: string;
    })
  | (EventBase & {
      outcome: 'cancelled';
      attemptedProviders: string[];
    });

export type ObservabilitySink = {
  record: (event: GatewayEvent) => void;
};
