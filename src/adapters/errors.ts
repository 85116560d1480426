export type ProviderErrorType =
  | 'RATE_LIMIT'
  | 'QUOTA_EXCEEDED'
  | 'AUTH'
  | 'TRANSIENT'
  | 'PERMANENT';

export class ProviderInvocationError extends Error {
  type: ProviderErrorType;
  provider: string;
  status?: number;

  constructor(provider: string, type: ProviderErrorType, message: string, status?: number) {
    super(message);
    this.name = 'ProviderInvocationError';
    this.provider = provider;
    this.type = type;
    this.status = status;
  }
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : undefined;
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

function networkCode(error: object): string | undefined {
  const direct = readString(error, 'code');
  if (direct) return direct;
  const cause: unknown = Reflect.get(error, 'cause');
  if (cause && typeof cause === 'object') return readString(cause, 'code');
  return undefined;
}

export function normalizeProviderError(error: unknown, provider: string): ProviderInvocationError {
  if (error instanceof ProviderInvocationError) return error;
  if (!error || typeof error !== 'object') {
    return new ProviderInvocationError(provider, 'PERMANENT', String(error ?? 'Provider error'));
  }

  const status = readNumber(error, 'statusCode') ?? readNumber(error, 'status');
  const message = readString(error, 'message') || 'Provider error';

  if (status === 429) {
    return new ProviderInvocationError(provider, 'RATE_LIMIT', message, status);
  }

  if (status === 402) {
    return new ProviderInvocationError(provider, 'QUOTA_EXCEEDED', message, status);
  }

  if (status === 401 || status === 403) {
    return new ProviderInvocationError(provider, 'AUTH', message, status);
  }

  if (status && status >= 500) {
    return new ProviderInvocationError(provider, 'TRANSIENT', message, status);
  }

  const code = networkCode(error);
  if (status === undefined && (message === 'fetch failed' || (code && NETWORK_ERROR_CODES.has(code)))) {
    return new ProviderInvocationError(provider, 'TRANSIENT', message);
  }

  return new ProviderInvocationError(provider, 'PERMANENT', message, status);
}
