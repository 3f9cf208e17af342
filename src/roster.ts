import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import type { Config } from "./config";
import { RosterError } from "./errors";
import { debugLog, infoLog, warnLog } from "./log";
import { ALIGNMENTS, BIRTHPLACES, Sinner, TENDENCIES } from "./types";

export const BUNDLED_ROSTER_PATH = path.join(__dirname, "..", "data", "sinners.json");
export const CACHE_FILE = "sinners.json";

const MAX_CODE = 0xffff;
const MAX_HEIGHT = 255;

const rawSinnerSchema = z.object({
  name: z.string().min(1),
  code: z.string(),
  alignment: z.enum(ALIGNMENTS),
  tendency: z.enum(TENDENCIES),
  height: z.string(),
  birthplace: z.enum(BIRTHPLACES),
});
const rawRosterSchema = z.array(rawSinnerSchema);

type RawSinner = z.infer<typeof rawSinnerSchema>;

// Anything that is not a plain decimal in range (e.g. "NOX") has no code.
function parseCode(code: string): number | undefined {
  if (!/^\d+$/.test(code)) return undefined;
  const n = parseInt(code, 10);
  return n <= MAX_CODE ? n : undefined;
}

function parseHeight(raw: RawSinner): number {
  const m = /^(\d+)cm$/.exec(raw.height);
  const h = m ? parseInt(m[1], 10) : NaN;
  if (!(h >= 1 && h <= MAX_HEIGHT)) {
    throw new RosterError(`invalid height \`${raw.height}\` for ${raw.name}`);
  }
  return h;
}

export function toSinner(raw: RawSinner): Sinner {
  return {
    name: raw.name,
    code: parseCode(raw.code),
    alignment: raw.alignment,
    tendency: raw.tendency,
    height: parseHeight(raw),
    birthplace: raw.birthplace,
  };
}

// The candidate filter relies on codes identifying sinners.
function checkCodes(roster: readonly Sinner[]) {
  const seen = new Map<number, string>();
  let codeless = 0;
  for (const s of roster) {
    if (s.code === undefined) {
      codeless++;
      continue;
    }
    const other = seen.get(s.code);
    if (other !== undefined) throw new RosterError(`${s.name} and ${other} share code ${s.code}`);
    seen.set(s.code, s.name);
  }
  if (codeless !== 1) throw new RosterError(`expected exactly one sinner without a code, found ${codeless}`);
}

/** Parses roster JSON, keeping its order. */
export function parseRoster(json: string): Sinner[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    throw new RosterError(`roster is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = rawRosterSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RosterError(`invalid roster at ${issue.path.join(".")}: ${issue.message}`);
  }
  const roster = parsed.data.map(toSinner);
  checkCodes(roster);
  return roster;
}

export async function isCacheOutdated(file: string, maxAgeMs: number, now: number): Promise<boolean> {
  try {
    const info = await stat(file);
    return now - info.mtimeMs > maxAgeMs;
  } catch {
    return true;
  }
}

export type RosterDeps = {
  fetch: typeof fetch;
  now: () => number;
  bundledPath: string;
};

const defaultDeps: RosterDeps = {
  fetch: (input, init) => fetch(input, init),
  now: () => Date.now(),
  bundledPath: BUNDLED_ROSTER_PATH,
};

async function fetchRoster(url: string, doFetch: typeof fetch): Promise<string> {
  const res = await doFetch(url);
  if (!res.ok) throw new Error(`HTTP ${res.status} from ${url}`);
  return res.text();
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Remote copy when forced or the cache is stale, else the cache, else the
 * bundled copy. A fetched roster is cached only once it validates.
 */
export async function loadRoster(config: Config, deps: Partial<RosterDeps> = {}): Promise<Sinner[]> {
  const d = { ...defaultDeps, ...deps };
  try {
    await mkdir(config.cacheDir, { recursive: true });
  } catch (e) {
    throw new RosterError(`Failed to create sinner cache directory: ${errorMessage(e)}`);
  }
  const cachePath = path.join(config.cacheDir, CACHE_FILE);

  if (config.rosterUrl === undefined) {
    if (config.forceCacheUpdate) warnLog("--force-cache-update has no effect without SINNERDLE_ROSTER_URL");
  } else {
    const stale = config.forceCacheUpdate || (await isCacheOutdated(cachePath, config.cacheMaxAgeMs, d.now()));
    if (stale) {
      try {
        const json = await fetchRoster(config.rosterUrl, d.fetch);
        const roster = parseRoster(json);
        await writeFile(cachePath, json).catch((e: unknown) => warnLog(`Could not write cache: ${errorMessage(e)}`));
        debugLog(`fetched ${roster.length} sinners from ${config.rosterUrl}`);
        return roster;
      } catch (e) {
        warnLog(`Failed to update sinner data: ${errorMessage(e)}. Falling back to reading cache instead.`);
      }
    }
  }

  try {
    const roster = parseRoster(await readFile(cachePath, "utf8"));
    debugLog(`read ${roster.length} sinners from ${cachePath}`);
    return roster;
  } catch (e) {
    // without a remote nothing ever writes the cache
    if (config.rosterUrl !== undefined || !isMissingFile(e)) {
      warnLog(`Could not read cache: ${errorMessage(e)}. Falling back to bundled data.`);
    }
  }
  infoLog(`using bundled roster ${d.bundledPath}`);
  return parseRoster(await readFile(d.bundledPath, "utf8"));
}
