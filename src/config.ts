import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { SinnerdleError } from "./errors";

export const CACHE_MAX_AGE_MS = 24 * 3600 * 1000;

export type Config = {
  /** Remote roster JSON; without one only the cache and bundled copy are read. */
  rosterUrl?: string;
  cacheDir: string;
  cacheMaxAgeMs: number;
  forceCacheUpdate: boolean;
  debug: boolean;
};

export type ConfigFlags = {
  forceCacheUpdate?: boolean;
};

const envSchema = z.object({
  SINNERDLE_ROSTER_URL: z.string().url().optional(),
  SINNERDLE_CACHE_DIR: z.string().min(1).optional(),
  SINNERDLE_DEBUG: z.enum(["0", "1"]).optional(),
  XDG_CACHE_HOME: z.string().min(1).optional(),
});

export class ConfigError extends SinnerdleError {}

export function defaultCacheDir(xdgCacheHome: string | undefined, home = os.homedir()): string {
  return path.join(xdgCacheHome ?? path.join(home, ".cache"), "sinnerdle-cli");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, flags: ConfigFlags = {}): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid environment: ${issue.path.join(".")}: ${issue.message}`);
  }
  const e = parsed.data;
  return {
    rosterUrl: e.SINNERDLE_ROSTER_URL,
    cacheDir: e.SINNERDLE_CACHE_DIR ?? defaultCacheDir(e.XDG_CACHE_HOME),
    cacheMaxAgeMs: CACHE_MAX_AGE_MS,
    forceCacheUpdate: flags.forceCacheUpdate ?? false,
    debug: e.SINNERDLE_DEBUG === "1",
  };
}
