import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { normalizeHandle, type IdentityMap } from './identity-resolver.js';
import * as log from '../utils/logger.js';

const IdentityFileSchema = z.record(z.string().min(1));

/**
 * Load the Telegram → Zulip user mapping (flat JSON object).
 * A missing file is not fatal: every lookup simply misses.
 */
export async function loadIdentityMap(path: string): Promise<IdentityMap> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) {
      log.warn(`Users mapping file ${path} not found, mentions will not be linked`);
      return new Map();
    }
    throw err;
  }

  return parseIdentityMap(content, path);
}

export function parseIdentityMap(content: string, source = 'users mapping'): IdentityMap {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new Error(`${source}: invalid JSON (${log.describeError(err)})`);
  }

  const parsed = IdentityFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at "${issue.path.join('.')}"` : '';
    throw new Error(`${source}: expected an object of strings${where}`);
  }

  const map = new Map<string, string>();
  for (const [key, value] of Object.entries(parsed.data)) {
    map.set(normalizeHandle(key), value);
  }
  log.debug(`Loaded ${map.size} user mappings from ${source}`);
  return map;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
