import { existsSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';

import { logDebug, setDebugEnabled } from './logger.js';

export const DEFAULT_DATABASE_FILE = 'compile_commands.json';

const configSchema = z.object({
  /** Enable debug logs without env var */
  debug: z.boolean().optional(),
  /** Database file, relative to the project root unless absolute */
  databasePath: z.string().optional(),
  /** Save-time wire format */
  format: z
    .object({
      commandAsArray: z.boolean().optional(),
    })
    .optional(),
});

export type CompdbConfig = z.infer<typeof configSchema>;

// Keyed by absolute config path, so each project root gets its own entry.
const cached = new Map<string, CompdbConfig | null>();

function configPath(projectRoot: string) {
  return join(projectRoot, 'compdb.config.js');
}

function pickDefault(mod: unknown): unknown {
  if (typeof mod === 'object' && mod !== null && 'default' in mod) {
    return mod.default;
  }
  return mod;
}

/**
 * Loads optional `compdb.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads each project's config at most once per process
 * - Validated: an unexpected shape throws with the offending keys listed
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<CompdbConfig | null> {
  const p = resolve(configPath(projectRoot));
  const hit = cached.get(p);
  if (hit !== undefined) return hit;

  if (!existsSync(p)) {
    cached.set(p, null);
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const url = pathToFileURL(p).href;
  const mod: unknown = await import(url);
  const parsed = configSchema.safeParse(pickDefault(mod));
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => i.path.join('.') || '<root>');
    throw new Error(`Invalid compdb.config.js at ${p}: ${keys.join(', ')}`);
  }

  cached.set(p, parsed.data);
  logDebug('loaded config', { path: p });
  return parsed.data;
}

/** Side effects of a loaded config (currently only debug logging). */
export function applyConfig(config: CompdbConfig | null) {
  if (config?.debug) setDebugEnabled(true);
}

export function resolveDatabasePath(
  config: CompdbConfig | null,
  projectRoot: string = process.cwd(),
): string {
  const p = config?.databasePath ?? DEFAULT_DATABASE_FILE;
  return isAbsolute(p) ? p : resolve(projectRoot, p);
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached.clear();
}
