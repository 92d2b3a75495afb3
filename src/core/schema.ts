import { z } from "zod";
import { TRANSFORM_NAMES } from "../processors/index.js";

// --- Config file schema (.filepool.yaml) ---

export const configSchema = z.object({
  concurrency: z.number().int().positive().optional().describe("Number of parallel worker slots"),
  processor: z.enum(TRANSFORM_NAMES).optional().describe("Built-in transformation applied to each file"),
  extensions: z.array(z.string()).optional().describe("Only process files with these extensions"),
  ignore: z.array(z.string()).optional().describe("File and directory names to skip"),
  recursive: z.boolean().optional().describe("Descend into subdirectories"),
  encoding: z.string().refine((name) => Buffer.isEncoding(name), "Unsupported encoding").optional()
    .describe("Text decoding for line-based processors"),
});

export type ConfigFile = z.infer<typeof configSchema>;

// --- Constants ---

export const CONFIG_FILENAME = ".filepool.yaml";
export const DEFAULT_CONCURRENCY = 4;
export const CONCURRENCY_ENV = "FILEPOOL_CONCURRENCY";
