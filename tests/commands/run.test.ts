import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import chalk from "chalk";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { runCommand } from "../../src/commands/run.js";
import { writeConfig } from "../../src/core/writer.js";
import type { FileTransform } from "../../src/core/processor.js";
import type { TransformResult } from "../../src/processors/index.js";
import { createTmpDir, cleanupTmpDir, createFile, createNestedFile } from "../helpers.js";

vi.mock("../../src/processors/index.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/processors/index.js")>();
  return {
    ...actual,
    getTransform: (name: string): FileTransform<TransformResult> => {
      const transform = actual.getTransform(name);
      return async (handle, item, context) => {
        if (item.id === "bad.txt") throw new Error("corrupt header");
        return transform(handle, item, context);
      };
    },
  };
});

let tmpDir: string;
let logs: string[];
let errors: string[];
let stdout: string;

beforeEach(async () => {
  tmpDir = await createTmpDir();
  logs = [];
  errors = [];
  stdout = "";
  chalk.level = 0;
  vi.stubEnv("FILEPOOL_CONCURRENCY", "");
  vi.spyOn(console, "log").mockImplementation((...args) => {
    logs.push(args.map(String).join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args) => {
    errors.push(args.map(String).join(" "));
  });
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    stdout += String(chunk);
    return true;
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  process.exitCode = undefined;
  await cleanupTmpDir(tmpDir);
});

describe("runCommand", () => {
  it("prints one line per file in submission order and a summary", async () => {
    await createFile(tmpDir, "b.txt", "z");
    await createFile(tmpDir, "a.txt", "x\ny");

    const outcomes = await runCommand(tmpDir, {});

    expect(outcomes?.map((o) => o.id)).toEqual(["a.txt", "b.txt"]);
    expect(logs).toContain("\nlines · 2 files · 4 workers\n");
    const first = logs.indexOf("  ✓ a.txt: 2");
    const second = logs.indexOf("  ✓ b.txt: 1");
    expect(first).toBeGreaterThanOrEqual(0);
    expect(second).toBe(first + 1);
    expect(logs).toContain("\n2 files: 2 succeeded, 0 failed\n");
    expect(process.exitCode).toBeUndefined();
  });

  it("reports a failing file without dropping the others and exits with 2", async () => {
    await createFile(tmpDir, "a.txt", "one");
    await createFile(tmpDir, "bad.txt", "two");
    await createFile(tmpDir, "c.txt", "three");

    const outcomes = await runCommand(tmpDir, { concurrency: "2" });

    expect(outcomes?.map((o) => o.status)).toEqual(["success", "failure", "success"]);
    expect(logs).toContain("  ✗ bad.txt: Error: corrupt header");
    expect(logs).toContain("\n3 files: 2 succeeded, 1 failed\n");
    expect(process.exitCode).toBe(2);
  });

  it("emits a JSON report with --json", async () => {
    await createFile(tmpDir, "a.txt", "one two");
    await createFile(tmpDir, "bad.txt", "x");

    await runCommand(tmpDir, { json: true, processor: "words", concurrency: "2" });

    expect(logs).toEqual([]);
    expect(JSON.parse(stdout)).toEqual({
      directory: tmpDir,
      processor: "words",
      concurrency: 2,
      summary: { total: 2, succeeded: 1, failed: 1, cancelled: 0 },
      outcomes: [
        { id: "a.txt", status: "success", value: 2 },
        { id: "bad.txt", status: "failure", error: { kind: "Error", message: "corrupt header" } },
      ],
    });
  });

  it("applies settings from .filepool.yaml", async () => {
    await createFile(tmpDir, "a.txt", "hello");
    await createFile(tmpDir, "b.md", "skipped");
    await createNestedFile(tmpDir, "sub/c.txt", "hi");
    await writeConfig(tmpDir, { concurrency: 2, processor: "bytes", extensions: [".txt"], recursive: true });

    const outcomes = await runCommand(tmpDir, {});

    expect(logs).toContain("\nbytes · 2 files · 2 workers\n");
    expect(outcomes).toEqual([
      { status: "success", id: "a.txt", value: 5 },
      { status: "success", id: "sub/c.txt", value: 2 },
    ]);
  });

  it("lets flags override the config file", async () => {
    await createFile(tmpDir, "a.txt", "hello");
    await writeConfig(tmpDir, { concurrency: 2, processor: "bytes" });

    await runCommand(tmpDir, { processor: "head", concurrency: "1" });

    expect(logs).toContain("\nhead · 1 files · 1 workers\n");
    expect(logs).toContain("  ✓ a.txt: hello");
  });

  it("reports invalid concurrency before processing anything", async () => {
    await createFile(tmpDir, "a.txt", "x");

    const outcomes = await runCommand(tmpDir, { concurrency: "0" });

    expect(outcomes).toBeNull();
    expect(errors).toEqual(['  ✗ Invalid --concurrency: "0" (must be a positive integer)']);
    expect(process.exitCode).toBe(1);
    expect(logs).toEqual([]);
  });

  it("decodes with the requested encoding", async () => {
    await writeFile(join(tmpDir, "a.txt"), Buffer.from("señal\n", "latin1"));

    await runCommand(tmpDir, { processor: "head", encoding: "latin1" });

    expect(logs).toContain("  ✓ a.txt: señal");
  });

  it("reports an unknown encoding", async () => {
    const outcomes = await runCommand(tmpDir, { encoding: "klingon" });

    expect(outcomes).toBeNull();
    expect(errors).toEqual(['  ✗ Invalid encoding: "klingon" (not a supported text encoding)']);
    expect(process.exitCode).toBe(1);
  });

  it("reports an unknown processor", async () => {
    const outcomes = await runCommand(tmpDir, { processor: "nope" });

    expect(outcomes).toBeNull();
    expect(errors[0]).toContain("Invalid processor");
    expect(process.exitCode).toBe(1);
  });

  it("warns when the directory has no files", async () => {
    const outcomes = await runCommand(tmpDir, {});

    expect(outcomes).toEqual([]);
    expect(logs).toEqual([`  ⚠ No files found in ${tmpDir}`]);
  });

  it("prints cancelled files when the signal is already aborted", async () => {
    await createFile(tmpDir, "a.txt", "x");
    await createFile(tmpDir, "b.txt", "y");
    const controller = new AbortController();
    controller.abort();

    await runCommand(tmpDir, { signal: controller.signal });

    expect(logs).toContain("  - a.txt: cancelled");
    expect(logs).toContain("\n2 files: 0 succeeded, 0 failed, 2 cancelled\n");
  });
});
