import { resolve } from "node:path";
import { listFiles } from "../core/enumerator.js";
import { runBatch } from "../core/dispatcher.js";
import { fileProcessor } from "../core/processor.js";
import type { FileTransform } from "../core/processor.js";
import { InvalidConfigurationError, toErrorMessage } from "../core/errors.js";
import { summarizeOutcomes } from "../core/types.js";
import type { Outcome, OutcomeStatus } from "../core/types.js";
import { CONFIG_FILENAME } from "../core/schema.js";
import { getTransform, getEncoding, DEFAULT_TRANSFORM } from "../processors/index.js";
import type { TransformResult } from "../processors/index.js";
import { loadConfig, resolveConcurrency } from "../utils/config.js";
import { errorMsg, warnMsg, heading, dim, formatOutcome, formatSummary, progressBar } from "../utils/display.js";

export interface RunOptions {
  /** Directory holding .filepool.yaml; defaults to the target directory */
  path?: string;
  concurrency?: string;
  processor?: string;
  encoding?: string;
  ext?: string[];
  recursive?: boolean;
  json?: boolean;
  /** Replaces the SIGINT wiring; used by callers that manage cancellation */
  signal?: AbortSignal;
}

export async function runCommand(
  target: string | undefined,
  options: RunOptions,
): Promise<Outcome<TransformResult>[] | null> {
  const targetDir = resolve(target ?? options.path ?? ".");
  const rootPath = resolve(options.path ?? targetDir);
  const config = await loadConfig(rootPath);

  let concurrency: number;
  let processorName: string;
  let transform: FileTransform<TransformResult>;
  let encoding: BufferEncoding;
  try {
    concurrency = resolveConcurrency(options.concurrency, config);
    processorName = options.processor ?? config?.processor ?? DEFAULT_TRANSFORM;
    transform = getTransform(processorName);
    encoding = getEncoding(options.encoding ?? config?.encoding);
  } catch (err) {
    if (err instanceof InvalidConfigurationError) {
      console.error(errorMsg(err.message));
      process.exitCode = 1;
      return null;
    }
    throw err;
  }

  const items = await listFiles(targetDir, {
    extensions: options.ext ?? config?.extensions,
    recursive: options.recursive ?? config?.recursive,
    ignore: [CONFIG_FILENAME, ...(config?.ignore ?? [])],
  });

  const controller = options.signal ? null : new AbortController();
  const onSigint = () => controller?.abort();
  if (controller) process.once("SIGINT", onSigint);

  const showProgress = !options.json && process.stdout.isTTY === true && items.length > 0;

  let outcomes: Outcome<TransformResult>[];
  try {
    outcomes = await runBatch(items, fileProcessor(transform, { encoding }), concurrency, {
      signal: options.signal ?? controller?.signal,
      onProgress: showProgress
        ? (completed, total) => process.stdout.write(`\r${progressBar(completed, total)}`)
        : undefined,
    });
  } finally {
    if (controller) process.off("SIGINT", onSigint);
  }
  if (showProgress) process.stdout.write("\n");

  const summary = summarizeOutcomes(outcomes);
  if (summary.failed > 0) process.exitCode = 2;

  if (options.json) {
    process.stdout.write(JSON.stringify({
      directory: targetDir,
      processor: processorName,
      concurrency,
      summary,
      outcomes: outcomes.map(toJson),
    }, null, 2) + "\n");
    return outcomes;
  }

  if (items.length === 0) {
    console.log(warnMsg(`No files found in ${targetDir}`));
    return outcomes;
  }

  console.log(heading(`\n${processorName} · ${items.length} files · ${concurrency} workers\n`));
  for (const outcome of outcomes) {
    console.log(formatOutcome(outcome));
  }
  console.log(dim(`\n${formatSummary(summary)}\n`));
  return outcomes;
}

interface JsonOutcome {
  id: string;
  status: OutcomeStatus;
  value?: TransformResult;
  error?: { kind: string; message: string };
}

function toJson(outcome: Outcome<TransformResult>): JsonOutcome {
  switch (outcome.status) {
    case "success":
      return { id: outcome.id, status: outcome.status, value: outcome.value };
    case "failure":
      return {
        id: outcome.id,
        status: outcome.status,
        error: { kind: outcome.error.kind, message: toErrorMessage(outcome.error) },
      };
    case "cancelled":
      return { id: outcome.id, status: outcome.status };
  }
}
