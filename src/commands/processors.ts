import { heading } from "../utils/display.js";
import { TRANSFORM_NAMES, DEFAULT_TRANSFORM } from "../processors/index.js";

const DESCRIPTIONS: Record<(typeof TRANSFORM_NAMES)[number], string> = {
  lines: "Number of lines",
  words: "Number of whitespace-separated words",
  bytes: "File size in bytes",
  checksum: "SHA-256 of the file content",
  head: "First line of the file",
};

export async function processorsCommand(): Promise<void> {
  console.log(heading("\nBuilt-in processors:\n"));
  for (const name of TRANSFORM_NAMES) {
    const marker = name === DEFAULT_TRANSFORM ? " (default)" : "";
    console.log(`  ${name.padEnd(10)}${DESCRIPTIONS[name]}${marker}`);
  }
  console.log("");
}
