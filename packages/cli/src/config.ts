import * as path from "node:path";
import { DEFAULT_COLLISION_GROUP, DEFAULT_MAX_FACE_EDGES, type TailPolicy } from "@vphys/core";

export type Verbosity = "quiet" | "normal" | "verbose";

/** Settings for one `extract` run. */
export interface ExtractConfig {
  inputDir: string;
  outputDir: string;
  /** File extension to pick up, with its dot. */
  extension: string;
  group: string;
  maxFaceEdges: number;
  tail: TailPolicy;
  verbosity: Verbosity;
}

/** Options as commander hands them over; every value is still a string or flag. */
export interface ExtractCliOptions {
  input?: string;
  output?: string;
  ext?: string;
  group?: string;
  maxFaceEdges?: string;
  strictTail?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export const DEFAULT_INPUT_DIR = "input";
export const DEFAULT_OUTPUT_DIR = "output";
export const DEFAULT_EXTENSION = ".vphys";

function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Merge CLI options over environment variables over defaults.
 * Directories are resolved against `cwd`.
 */
export function resolveExtractConfig(
  options: ExtractCliOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ExtractConfig {
  const inputDir = options.input ?? env.VPHYS_INPUT_DIR ?? DEFAULT_INPUT_DIR;
  const outputDir = options.output ?? env.VPHYS_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR;

  let extension = options.ext ?? DEFAULT_EXTENSION;
  if (!extension.startsWith(".")) extension = `.${extension}`;

  let verbosity: Verbosity = "normal";
  if (options.quiet) verbosity = "quiet";
  else if (options.verbose) verbosity = "verbose";

  return {
    inputDir: path.resolve(cwd, inputDir),
    outputDir: path.resolve(cwd, outputDir),
    extension: extension.toLowerCase(),
    group: options.group ?? DEFAULT_COLLISION_GROUP,
    maxFaceEdges:
      options.maxFaceEdges === undefined
        ? DEFAULT_MAX_FACE_EDGES
        : parsePositiveInt(options.maxFaceEdges, "--max-face-edges"),
    tail: options.strictTail ? "reject" : "truncate",
    verbosity,
  };
}
