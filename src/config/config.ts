import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { parse as parseYAML } from 'yaml';
import { BridgeConfigSchema, type BridgeConfig } from './schema.js';

/** Looked up in the working directory when no path is given. */
export const DEFAULT_CONFIG_FILES = ['bridge.json', 'bridge.yaml', 'bridge.yml'];

/**
 * Load config with priority: overrides > env vars > config file > defaults.
 * An explicit `path` must exist; the default files are optional.
 */
export async function loadConfig(path?: string, overrides?: Record<string, unknown>): Promise<BridgeConfig> {
  const fileConfig = path
    ? await loadFile(resolve(path), true)
    : await loadFirstDefault();

  const merged = deepMerge(fileConfig, loadEnvVars(), overrides ?? {});
  return BridgeConfigSchema.parse(merged);
}

async function loadFirstDefault(): Promise<Record<string, unknown>> {
  for (const name of DEFAULT_CONFIG_FILES) {
    const found = await loadFile(resolve('.', name), false);
    if (Object.keys(found).length > 0) return found;
  }
  return {};
}

export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  if (env.TELEGRAM_BOT_TOKEN) {
    result.telegram = { token: env.TELEGRAM_BOT_TOKEN };
  }

  const zulip = {
    ...(env.ZULIP_SITE ? { site: env.ZULIP_SITE } : {}),
    ...(env.ZULIP_EMAIL ? { email: env.ZULIP_EMAIL } : {}),
    ...(env.ZULIP_API_KEY ? { apiKey: env.ZULIP_API_KEY } : {}),
    ...(env.ZULIP_STREAM ? { stream: env.ZULIP_STREAM } : {}),
    ...(env.ZULIP_TOPIC !== undefined ? { topic: env.ZULIP_TOPIC } : {}),
  };
  if (Object.keys(zulip).length > 0) result.zulip = zulip;

  if (env.BRIDGE_LOG_LEVEL) {
    result.log = { level: env.BRIDGE_LOG_LEVEL };
  }

  return result;
}

async function loadFile(path: string, required: boolean): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (required) {
      throw new Error(`Configuration file ${path} doesn't exist or cannot be read`, { cause: err });
    }
    return {};
  }

  const ext = extname(path).toLowerCase();
  const raw: unknown = ext === '.yaml' || ext === '.yml' ? parseYAML(content) : JSON.parse(content);
  if (!isRecord(raw)) {
    throw new Error(`Configuration file ${path} must contain an object`);
  }
  return raw;
}

export interface MissingCredentials {
  telegram: string[];
  zulip: string[];
}

/** Keys `run` cannot start without. */
export function missingCredentials(config: BridgeConfig): MissingCredentials {
  return {
    telegram: config.telegram.token ? [] : ['telegram.token'],
    zulip: (['site', 'email', 'apiKey'] as const)
      .filter(key => !config.zulip[key])
      .map(key => `zulip.${key}`),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const existing = result[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}
