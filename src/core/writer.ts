import { readFile, writeFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { stringify, parse } from "yaml";
import { configSchema, CONFIG_FILENAME } from "./schema.js";
import type { ConfigFile } from "./schema.js";

/**
 * Write config file to disk
 */
export async function writeConfig(rootPath: string, data: ConfigFile): Promise<void> {
  configSchema.parse(data);

  const yamlContent = stringify(data, {
    lineWidth: 120,
    defaultStringType: "PLAIN",
    defaultKeyType: "PLAIN",
  });

  await writeFile(join(rootPath, CONFIG_FILENAME), yamlContent, "utf-8");
}

/**
 * Read config file from disk. Missing or invalid files read as null.
 */
export async function readConfig(rootPath: string): Promise<ConfigFile | null> {
  try {
    const content = await readFile(join(rootPath, CONFIG_FILENAME), "utf-8");
    const parsed: unknown = parse(content);
    return configSchema.parse(parsed);
  } catch {
    return null;
  }
}

/**
 * Whether a config file is present, readable or not. Tells a missing file
 * apart from one readConfig rejected.
 */
export async function configFileExists(rootPath: string): Promise<boolean> {
  try {
    return (await stat(join(rootPath, CONFIG_FILENAME))).isFile();
  } catch {
    return false;
  }
}
