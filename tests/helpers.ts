import { mkdtemp, rm, mkdir, writeFile } from "node:fs/promises";
import { join, dirname } from "node:path";
import { tmpdir } from "node:os";
import { createWorkItem } from "../src/core/types.js";
import type { WorkItem } from "../src/core/types.js";

export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "filepool-test-"));
}

export async function cleanupTmpDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function createFile(dirPath: string, name: string, content = ""): Promise<void> {
  await writeFile(join(dirPath, name), content);
}

export async function createNestedFile(basePath: string, relativePath: string, content = ""): Promise<void> {
  const fullPath = join(basePath, relativePath);
  await mkdir(dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content);
}

export function makeItems(count: number): WorkItem<number>[] {
  return Array.from({ length: count }, (_, i) => createWorkItem(`item-${i + 1}`, i + 1));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * A promise with its resolve function exposed, for driving completion
 * order from a test.
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Counts in-flight calls around an async body and records the peak.
 */
export function concurrencyTracker() {
  let running = 0;
  let maxRunning = 0;
  return {
    async track<T>(body: () => Promise<T>): Promise<T> {
      running++;
      maxRunning = Math.max(maxRunning, running);
      try {
        return await body();
      } finally {
        running--;
      }
    },
    get max(): number {
      return maxRunning;
    },
    get running(): number {
      return running;
    },
  };
}
