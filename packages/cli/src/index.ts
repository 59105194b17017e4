/**
 * @vphys/cli — command line around @vphys/core.
 */

export { createProgram, main } from "./program.js";
export {
  DEFAULT_EXTENSION,
  DEFAULT_INPUT_DIR,
  DEFAULT_OUTPUT_DIR,
  resolveExtractConfig,
} from "./config.js";
export type { ExtractCliOptions, ExtractConfig, Verbosity } from "./config.js";
export { discoverDocuments, outputPathFor, processDocument, runExtract } from "./extract.js";
export type { DocumentReport, RunSummary } from "./extract.js";
export { formatStats, runConvert, runInspect } from "./inspect.js";
export type { ConvertArgs, InspectArgs } from "./inspect.js";
export { Reporter, errorMessage } from "./reporter.js";
