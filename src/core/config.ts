import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { GatewayConfig, ProviderConfig, Purpose, PurposeRoute, RoutePolicy } from './types';
import { PURPOSES } from './purpose';
import { ConfigurationError } from './errors';
import { repeatedNames } from './routePolicy';
import { logInfo, logWarn } from '../util/logger';

const DEFAULT_CONFIG_DIR = 'config';

export type Env = Record<string, string | undefined>;

const timeoutSchema = z.number().int().positive();

const providerEntrySchema = z.object({
  name: z.string().min(1),
  baseUrl: z.string().optional(),
  model: z.string().optional(),
  enabled: z.boolean().default(true),
  timeoutMs: timeoutSchema.optional(),
  apiKeyEnv: z.string().optional(),
  baseUrlEnv: z.string().optional(),
  modelEnv: z.string().optional(),
  enabledEnv: z.string().optional(),
  timeoutMsEnv: z.string().optional(),
});

const providersFileSchema = z.object({
  primary: z.string().min(1),
  providers: z.array(providerEntrySchema).min(1),
});

const purposeRouteSchema = z.object({
  providers: z
    .array(z.string().min(1))
    .min(1)
    .refine((names) => repeatedNames(names).length === 0, {
      message: 'a provider may appear only once per route',
    }),
  timeoutMs: timeoutSchema.optional(),
});

const routesFileSchema = z.object({
  purposes: z.record(z.enum(PURPOSES), purposeRouteSchema).default({}),
});

export type ProviderEntry = z.infer<typeof providerEntrySchema>;
export type ProvidersFile = z.infer<typeof providersFileSchema>;
export type RoutesFile = z.infer<typeof routesFileSchema>;

function parseFile<T extends z.ZodTypeAny>(schema: T, raw: string, path: string): z.output<T> {
  const result = schema.safeParse(parseYaml(raw) ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${path}: ${issues}`);
  }
  return result.data;
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  return undefined;
}

function envTimeout(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function fromEnv(env: Env, key: string | undefined): string | undefined {
  if (!key) return undefined;
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * A provider counts as enabled only when its flag is on and it has both a
 * base URL and a model; a local endpoint left unset is disabled, not fatal.
 */
export function resolveProvider(entry: ProviderEntry, env: Env): ProviderConfig {
  const baseUrl = fromEnv(env, entry.baseUrlEnv) ?? entry.baseUrl ?? '';
  const model = fromEnv(env, entry.modelEnv) ?? entry.model ?? '';
  const flag = entry.enabledEnv ? envFlag(env[entry.enabledEnv]) ?? entry.enabled : entry.enabled;
  const timeoutMs = entry.timeoutMsEnv
    ? envTimeout(env[entry.timeoutMsEnv], entry.timeoutMsEnv) ?? entry.timeoutMs
    : entry.timeoutMs;

  const enabled = flag && baseUrl !== '' && model !== '';
  if (flag && !enabled) {
    logWarn('provider_disabled_incomplete', {
      provider: entry.name,
      hasBaseUrl: baseUrl !== '',
      hasModel: model !== '',
    });
  }

  return {
    name: entry.name,
    baseUrl,
    apiKey: fromEnv(env, entry.apiKeyEnv),
    model,
    enabled,
    timeoutMs,
  };
}

export function buildGatewayConfig(
  providersFile: ProvidersFile,
  routesFile: RoutesFile,
  env: Env = process.env
): GatewayConfig {
  const providers = providersFile.providers.map((entry) => resolveProvider(entry, env));
  const primary = fromEnv(env, 'LLM_PROVIDER')?.toLowerCase() ?? providersFile.primary;

  const purposes: Partial<Record<Purpose, PurposeRoute>> = {};
  for (const purpose of PURPOSES) {
    const route = routesFile.purposes[purpose];
    if (route) purposes[purpose] = route;
  }

  const policy: RoutePolicy = {
    defaultRoute: [primary],
    purposes,
  };

  return { providers, policy };
}

export async function loadConfig(
  configDir: string = DEFAULT_CONFIG_DIR,
  env: Env = process.env
): Promise<GatewayConfig> {
  const providersPath = join(configDir, 'providers.yaml');
  const routesPath = join(configDir, 'routes.yaml');

  const [providersRaw, routesRaw] = await Promise.all([
    readFile(providersPath, 'utf8'),
    readFile(routesPath, 'utf8'),
  ]);

  const config = buildGatewayConfig(
    parseFile(providersFileSchema, providersRaw, providersPath),
    parseFile(routesFileSchema, routesRaw, routesPath),
    env
  );

  logInfo('config_loaded', {
    providers: config.providers.map((p) => ({ name: p.name, model: p.model, enabled: p.enabled })),
    defaultRoute: config.policy.defaultRoute,
    purposes: Object.keys(config.policy.purposes),
  });
  return config;
}
