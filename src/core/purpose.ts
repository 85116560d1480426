import { logWarn } from '../util/logger';

export const PURPOSES = [
  'analyze_ticket',
  'analyze_ticket_cot',
  'propose_fields_only',
  'propose_solution',
  'generate',
] as const;

export type Purpose = (typeof PURPOSES)[number];

/** Routed through the default route unless the policy lists it. */
export const DEFAULT_PURPOSE: Purpose = 'generate';

export function isPurpose(value: string): value is Purpose {
  return PURPOSES.some((purpose) => purpose === value);
}

/**
 * Maps a purpose arriving from an untyped boundary (HTTP body, queue message)
 * onto the closed set. Unknown values fall back to `generate`.
 */
export function toPurpose(value: string | undefined): Purpose {
  const normalized = value?.trim().toLowerCase() ?? '';
  if (isPurpose(normalized)) return normalized;

  if (normalized) {
    logWarn('purpose_unknown', { purpose: normalized, fallback: DEFAULT_PURPOSE });
  }
  return DEFAULT_PURPOSE;
}
