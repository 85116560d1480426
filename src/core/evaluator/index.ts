import type { GenerateRequest } from '../types';
import { InvalidJsonOutputError } from '../errors';

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonObject(content: string, provider: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new InvalidJsonOutputError(
      provider,
      `Output is not valid JSON: ${error instanceof Error ? error.message : 'parse error'}`
    );
  }

  if (!isJsonObject(parsed)) {
    const found = Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed;
    throw new InvalidJsonOutputError(provider, `JSON mode requires an object, got ${found}`);
  }
  return parsed;
}

/** Throws when `content` does not satisfy the request's output contract. */
export function validateOutput(content: string, request: GenerateRequest, provider: string): void {
  if (request.jsonMode) {
    parseJsonObject(content, provider);
  }
}
