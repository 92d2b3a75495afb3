import { readdir } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { extname, join, resolve } from "node:path";
import { createWorkItem } from "./types.js";
import type { WorkItem } from "./types.js";

// Directories never descended into when listing recursively
const ALWAYS_IGNORE = new Set([
  "node_modules",
  ".git",
  "dist",
  "coverage",
]);

export interface ListOptions {
  /** Lowercase extensions including the dot, e.g. ".txt" */
  extensions?: string[];
  recursive?: boolean;
  /** Entry names to skip */
  ignore?: string[];
}

/**
 * List the regular files under a directory as work items, sorted by
 * relative path. Item ids are relative paths with "/" separators;
 * payloads are absolute paths.
 *
 * Entries that are not plain files are skipped. A directory that cannot be
 * read lists as empty.
 */
export async function listFiles(
  dirPath: string,
  options: ListOptions = {},
): Promise<WorkItem<string>[]> {
  const root = resolve(dirPath);
  const extensions = options.extensions?.length
    ? new Set(options.extensions.map(normalizeExtension))
    : null;
  const ignore = new Set(options.ignore ?? []);

  const found: Array<{ id: string; path: string }> = [];
  await walk(root, "", found, { extensions, ignore, recursive: options.recursive ?? false });

  found.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  return found.map((f) => createWorkItem(f.id, f.path));
}

interface WalkState {
  extensions: Set<string> | null;
  ignore: Set<string>;
  recursive: boolean;
}

async function walk(
  dirPath: string,
  relPath: string,
  found: Array<{ id: string; path: string }>,
  state: WalkState,
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch {
    return;
  }

  for (const entry of entries) {
    if (state.ignore.has(entry.name)) continue;
    const id = relPath ? `${relPath}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      if (!state.recursive) continue;
      if (ALWAYS_IGNORE.has(entry.name) || entry.name.startsWith(".")) continue;
      await walk(join(dirPath, entry.name), id, found, state);
    } else if (entry.isFile()) {
      if (state.extensions && !state.extensions.has(extname(entry.name).toLowerCase())) continue;
      found.push({ id, path: join(dirPath, entry.name) });
    }
  }
}

export function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}
