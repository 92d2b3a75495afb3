import { resolve } from "node:path";
import { loadConfig, saveConfig } from "../utils/config.js";
import { heading, errorMsg, successMsg, warnMsg } from "../utils/display.js";
import { configFileExists } from "../core/writer.js";
import { assertConcurrency, InvalidConfigurationError } from "../core/errors.js";
import { normalizeExtension } from "../core/enumerator.js";
import { CONFIG_FILENAME, DEFAULT_CONCURRENCY } from "../core/schema.js";
import type { ConfigFile } from "../core/schema.js";
import { isTransformName, TRANSFORM_NAMES, DEFAULT_TRANSFORM, DEFAULT_ENCODING } from "../processors/index.js";

export async function configCommand(
  options: {
    path?: string;
    concurrency?: string;
    processor?: string;
    encoding?: string;
    ext?: string[];
    ignore?: string[];
    recursive?: boolean;
  },
): Promise<void> {
  const rootPath = resolve(options.path ?? ".");
  const existing = await loadConfig(rootPath);
  const unreadable = !existing && await configFileExists(rootPath);

  // If no flags, show current config
  if (!options.concurrency && !options.processor && !options.encoding && !options.ext && !options.ignore
    && options.recursive === undefined) {
    if (unreadable) {
      console.log(errorMsg(`${CONFIG_FILENAME} is invalid and was ignored. Defaults apply.`));
      return;
    }
    if (!existing) {
      console.log(errorMsg(`No ${CONFIG_FILENAME} found. Defaults apply.`));
      return;
    }
    console.log(heading("\nCurrent configuration:\n"));
    console.log(`  concurrency: ${existing.concurrency ?? DEFAULT_CONCURRENCY}`);
    console.log(`  processor: ${existing.processor ?? DEFAULT_TRANSFORM}`);
    console.log(`  encoding: ${existing.encoding ?? DEFAULT_ENCODING}`);
    if (existing.extensions?.length) console.log(`  extensions: ${existing.extensions.join(", ")}`);
    if (existing.ignore?.length) console.log(`  ignore: ${existing.ignore.join(", ")}`);
    console.log(`  recursive: ${existing.recursive ?? false}`);
    console.log("");
    return;
  }

  const updated: ConfigFile = existing ?? {};

  if (options.concurrency) {
    try {
      updated.concurrency = assertConcurrency(options.concurrency);
    } catch (err) {
      if (!(err instanceof InvalidConfigurationError)) throw err;
      console.log(errorMsg("concurrency must be a positive integer"));
      process.exitCode = 1;
      return;
    }
  }

  if (options.processor) {
    if (!isTransformName(options.processor)) {
      console.log(errorMsg(`Invalid processor: ${options.processor}. Must be one of: ${TRANSFORM_NAMES.join(", ")}`));
      process.exitCode = 1;
      return;
    }
    updated.processor = options.processor;
  }

  if (options.encoding) {
    if (!Buffer.isEncoding(options.encoding)) {
      console.log(errorMsg(`Invalid encoding: ${options.encoding}`));
      process.exitCode = 1;
      return;
    }
    updated.encoding = options.encoding;
  }

  if (options.ext) {
    updated.extensions = [...new Set(options.ext.map(normalizeExtension))];
  }

  if (options.ignore) {
    updated.ignore = [...new Set([...(updated.ignore ?? []), ...options.ignore])];
  }

  if (options.recursive !== undefined) {
    updated.recursive = options.recursive;
  }

  if (unreadable) {
    console.log(warnMsg(`${CONFIG_FILENAME} could not be read; replacing it with the new settings.`));
  }

  await saveConfig(rootPath, updated);
  console.log(successMsg("Configuration updated."));
}
