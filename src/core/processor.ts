import { open } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { ItemProcessingError } from "./errors.js";
import { success, failure } from "./types.js";
import type { Outcome, Processor, WorkItem } from "./types.js";

export interface FileTransformContext {
  /** Text decoding for transforms that read lines or strings */
  encoding: BufferEncoding;
}

export type FileTransform<R> = (
  handle: FileHandle,
  item: WorkItem<string>,
  context: FileTransformContext,
) => Promise<R>;

export interface FileProcessorOptions {
  encoding?: BufferEncoding;
}

/**
 * Run one item through the processor. Sync throws and async rejections both
 * come back as failure outcomes; this function never rejects.
 */
export async function executeItem<P, R>(
  item: WorkItem<P>,
  processor: Processor<P, R>,
): Promise<Outcome<R>> {
  try {
    const value = await processor(item);
    return success(item.id, value);
  } catch (err) {
    return failure(item.id, new ItemProcessingError(item.id, err));
  }
}

/**
 * Scoped acquisition: `release` runs on every exit path of `use`.
 * If `use` fails, a failing `release` does not mask the original error.
 */
export async function withResource<T, R>(
  acquire: () => Promise<T>,
  use: (resource: T) => Promise<R>,
  release: (resource: T) => Promise<void>,
): Promise<R> {
  const resource = await acquire();
  let result: R;
  try {
    result = await use(resource);
  } catch (err) {
    try {
      await release(resource);
    } catch {
      // the failure from `use` is the one reported
    }
    throw err;
  }
  await release(resource);
  return result;
}

/**
 * Build a processor over file paths. The handle is opened read-only and is
 * closed whether the transform resolves or throws.
 */
export function fileProcessor<R>(
  transform: FileTransform<R>,
  options: FileProcessorOptions = {},
): Processor<string, R> {
  const context: FileTransformContext = { encoding: options.encoding ?? "utf-8" };
  return (item) => withResource(
    () => open(item.payload, "r"),
    (handle) => transform(handle, item, context),
    (handle) => handle.close(),
  );
}
