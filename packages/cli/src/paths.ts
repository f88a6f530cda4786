// packages/cli/src/paths.ts
import path from 'node:path';
import fs from 'node:fs';

export const DATA_DIRNAME = '.coinkeeper';
export const CONFIG_FILENAME = 'config.json';
export const STATE_FILENAME = 'state.json';

export type CliPaths = {
  root: string;
  dataDir: string;
  configFile: string;
  stateFile: string;
};

/**
 * Find the nearest directory at-or-above `startCwd` containing `.coinkeeper/config.json`.
 * If not found, fall back to `startCwd`.
 */
export function findConfigRoot(startCwd: string): string {
  let dir = path.resolve(startCwd);

  while (true) {
    const candidate = path.join(dir, DATA_DIRNAME, CONFIG_FILENAME);
    if (fs.existsSync(candidate)) return dir;

    const parent = path.dirname(dir);
    if (parent === dir) break; // reached filesystem root
    dir = parent;
  }

  return path.resolve(startCwd);
}

/** COINKEEPER_HOME, resolved against `cwd`, or null when unset. */
export function getForcedHomeFromEnv(cwd: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const raw = String(env.COINKEEPER_HOME ?? '').trim();
  if (!raw) return null;
  return path.resolve(cwd, raw);
}

/**
 * Root selection:
 *   1) --home
 *   2) COINKEEPER_HOME
 *   3) find-up from cwd
 */
export function resolvePaths(args: {
  cwd: string;
  home?: string | null;
  env?: NodeJS.ProcessEnv;
}): CliPaths {
  const { cwd, home, env } = args;

  const root = home ? path.resolve(cwd, home) : getForcedHomeFromEnv(cwd, env) ?? findConfigRoot(cwd);
  const dataDir = path.resolve(root, DATA_DIRNAME);

  return {
    root,
    dataDir,
    configFile: path.resolve(dataDir, CONFIG_FILENAME),
    stateFile: path.resolve(dataDir, STATE_FILENAME),
  };
}
