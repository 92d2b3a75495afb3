import { createHash } from "node:crypto";
import { createInterface } from "node:readline";
import type { FileHandle } from "node:fs/promises";
import { InvalidConfigurationError } from "../core/errors.js";
import type { FileTransform, FileTransformContext } from "../core/processor.js";

export type TransformResult = number | string;

export const TRANSFORM_NAMES = ["lines", "words", "bytes", "checksum", "head"] as const;

export type TransformName = typeof TRANSFORM_NAMES[number];

export const DEFAULT_TRANSFORM: TransformName = "lines";

/**
 * Iterate a file line by line. The stream leaves the handle open; closing it
 * belongs to whoever opened it.
 */
function readLines(
  handle: FileHandle,
  { encoding }: FileTransformContext,
  input = handle.createReadStream({ encoding, autoClose: false }),
) {
  return createInterface({ input, crlfDelay: Infinity });
}

async function countLines(handle: FileHandle, _item: unknown, context: FileTransformContext): Promise<number> {
  let count = 0;
  for await (const _line of readLines(handle, context)) {
    count++;
  }
  return count;
}

async function countWords(handle: FileHandle, _item: unknown, context: FileTransformContext): Promise<number> {
  let count = 0;
  for await (const line of readLines(handle, context)) {
    count += line.split(/\s+/u).filter(Boolean).length;
  }
  return count;
}

async function byteSize(handle: FileHandle): Promise<number> {
  const s = await handle.stat();
  return s.size;
}

async function checksum(handle: FileHandle): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of handle.createReadStream({ autoClose: false })) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

async function firstLine(handle: FileHandle, _item: unknown, context: FileTransformContext): Promise<string> {
  const input = handle.createReadStream({ encoding: context.encoding, autoClose: false });
  const lines = readLines(handle, context, input);
  try {
    for await (const line of lines) {
      return line;
    }
    return "";
  } finally {
    lines.close();
    input.destroy();
  }
}

const TRANSFORMS: Record<TransformName, FileTransform<TransformResult>> = {
  lines: countLines,
  words: countWords,
  bytes: byteSize,
  checksum,
  head: firstLine,
};

export const DEFAULT_ENCODING: BufferEncoding = "utf-8";

export function getEncoding(name: string | undefined): BufferEncoding {
  if (name === undefined) return DEFAULT_ENCODING;
  if (!Buffer.isEncoding(name)) {
    throw new InvalidConfigurationError("encoding", name, "not a supported text encoding");
  }
  return name;
}

export function isTransformName(name: string): name is TransformName {
  return Object.hasOwn(TRANSFORMS, name);
}

export function getTransform(name: string): FileTransform<TransformResult> {
  if (!isTransformName(name)) {
    throw new InvalidConfigurationError("processor", name, `expected one of: ${TRANSFORM_NAMES.join(", ")}`);
  }
  return TRANSFORMS[name];
}
