import { readConfig, writeConfig } from "../core/writer.js";
import { assertConcurrency } from "../core/errors.js";
import { CONCURRENCY_ENV, DEFAULT_CONCURRENCY } from "../core/schema.js";
import type { ConfigFile } from "../core/schema.js";

/**
 * Load project config, returning null if none exists.
 */
export async function loadConfig(rootPath: string): Promise<ConfigFile | null> {
  return readConfig(rootPath);
}

/**
 * Save project config.
 */
export async function saveConfig(rootPath: string, config: ConfigFile): Promise<void> {
  await writeConfig(rootPath, config);
}

/**
 * Resolve the worker count: CLI flag, then environment, then config file,
 * then the default. An invalid value at the winning layer throws.
 */
export function resolveConcurrency(
  flag: string | number | undefined,
  config: ConfigFile | null,
  env: NodeJS.ProcessEnv = process.env,
): number {
  if (flag !== undefined) return assertConcurrency(flag, "--concurrency");

  const fromEnv = env[CONCURRENCY_ENV];
  if (fromEnv !== undefined && fromEnv !== "") return assertConcurrency(fromEnv, CONCURRENCY_ENV);

  if (config?.concurrency !== undefined) return config.concurrency;
  return DEFAULT_CONCURRENCY;
}
