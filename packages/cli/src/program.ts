import { Command } from "commander";
import {
  DEFAULT_EXTENSION,
  DEFAULT_INPUT_DIR,
  DEFAULT_OUTPUT_DIR,
  resolveExtractConfig,
  type ExtractCliOptions,
} from "./config.js";
import { runExtract } from "./extract.js";
import { runConvert, runInspect } from "./inspect.js";
import { Reporter, errorMessage } from "./reporter.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("vphys")
    .description("Extract default-group collision triangles from vphys physics documents")
    .version("0.1.0");

  /**
   * Extract command - the default when no command is given.
   */
  program
    .command("extract", { isDefault: true })
    .description("Convert every document in the input directory to a .tri file")
    .option("-i, --input <dir>", `Input directory (env VPHYS_INPUT_DIR, default "${DEFAULT_INPUT_DIR}")`)
    .option("-o, --output <dir>", `Output directory (env VPHYS_OUTPUT_DIR, default "${DEFAULT_OUTPUT_DIR}")`)
    .option("-e, --ext <ext>", "Document extension to pick up", DEFAULT_EXTENSION)
    .option("-g, --group <label>", "Collision group to keep", "default")
    .option("--max-face-edges <n>", "Step cap per hull face loop")
    .option("--strict-tail", "Skip blobs whose length is not a whole number of elements", false)
    .option("-q, --quiet", "Only print errors", false)
    .option("-v, --verbose", "Print per-shape outcomes", false)
    .action((options: ExtractCliOptions) => {
      const config = resolveExtractConfig(options);
      runExtract(config, new Reporter(config.verbosity));
    });

  /**
   * Inspect command - summary figures for a .tri file.
   */
  program
    .command("inspect")
    .description("Print triangle count, bounds and area of a .tri file")
    .argument("<file>", ".tri file to inspect")
    .option("--json", "Output as JSON", false)
    .action((file: string, options: { json: boolean }) => {
      process.exitCode = runInspect({ input: file, json: options.json });
    });

  /**
   * Convert command - .tri to binary STL.
   */
  program
    .command("convert")
    .description("Convert a .tri file to binary STL")
    .argument("<file>", ".tri file to convert")
    .option("-o, --output <path>", "Output .stl path")
    .action((file: string, options: { output?: string }) => {
      process.exitCode = runConvert({ input: file, output: options.output });
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}
