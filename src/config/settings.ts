/**
 * Settings for an unpublish run, resolved from environment variables (loaded by dotenv in
 * the CLI) with explicit overrides taking precedence. The resulting value is passed to the
 * coordinator; nothing here is process-wide state.
 */

import * as path from 'path';
import { UnpublishError } from '../utils/errors.js';

export type RegistryTransportKind = 'rpc' | 'rest';

export interface RegistrySettings {
  transport: RegistryTransportKind;
  url: string;
  credentialFile?: string;
  debug: boolean;
  maxRetries: number;
  retryDelayMs: number;
  timeoutMs: number;
}

export interface UnpublishSettings {
  catalogPath: string;
  servingRoot: string;
  servingIndexFile: string;
  discoveryUrl?: string;
  registry: RegistrySettings;
  /** Registry calls per dataset (true) or per version (false) */
  deleteAtDatasetLevel: boolean;
}

export type SettingsOverrides = Partial<Omit<UnpublishSettings, 'registry'>> & {
  registry?: Partial<RegistrySettings>;
};

type Env = Record<string, string | undefined>;

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new UnpublishError('ConfigurationError', `Invalid boolean for ${key}: "${env[key]}"`, {
    context: { key },
  });
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new UnpublishError('ConfigurationError', `Invalid number for ${key}: "${raw}"`, {
      context: { key },
    });
  }
  return parsed;
}

function readOptional(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/**
 * Resolve the registry transport from REGISTRY_TRANSPORT, defaulting to the legacy RPC service.
 */
export function resolveTransportKind(value?: string): RegistryTransportKind {
  const kind = (value || 'rpc').toLowerCase();
  if (kind !== 'rpc' && kind !== 'rest') {
    throw new UnpublishError('ConfigurationError', `Invalid registry transport: "${value}". Must be rpc or rest.`);
  }
  return kind;
}

export function loadSettings(env: Env = process.env, overrides: SettingsOverrides = {}): UnpublishSettings {
  const servingRoot = overrides.servingRoot ?? env.SERVING_ROOT ?? './serving';
  const servingIndexFile =
    overrides.servingIndexFile ?? path.resolve(servingRoot, env.SERVING_INDEX_FILE ?? 'catalog-index.json');

  const registry: RegistrySettings = {
    transport: resolveTransportKind(env.REGISTRY_TRANSPORT),
    url: readOptional(env, 'REGISTRY_URL') ?? '',
    credentialFile: readOptional(env, 'REGISTRY_CREDENTIAL_FILE'),
    debug: readBoolean(env, 'REGISTRY_DEBUG', false),
    maxRetries: readNumber(env, 'REGISTRY_MAX_RETRIES', 3),
    retryDelayMs: readNumber(env, 'REGISTRY_RETRY_DELAY_MS', 1000),
    timeoutMs: readNumber(env, 'REGISTRY_TIMEOUT_MS', 30_000),
    ...overrides.registry,
  };

  return {
    catalogPath: overrides.catalogPath ?? env.UNPUBLISH_CATALOG_DB ?? './catalog.db',
    servingRoot,
    servingIndexFile,
    discoveryUrl: overrides.discoveryUrl ?? readOptional(env, 'DISCOVERY_REINIT_URL'),
    registry,
    deleteAtDatasetLevel: overrides.deleteAtDatasetLevel ?? readBoolean(env, 'DELETE_AT_DATASET_LEVEL', true),
  };
}

/**
 * The registry URL is only required once a registry phase actually runs.
 */
export function requireRegistryUrl(settings: RegistrySettings): string {
  if (!settings.url) {
    throw new UnpublishError('ConfigurationError', 'REGISTRY_URL is required for registry delete/retract operations');
  }
  return settings.url;
}
