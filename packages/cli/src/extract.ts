/**
 * `extract` — turn every vphys document in the input directory into a
 * `.tri` file in the output directory.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { extractCollision, toTriBytes, type ExtractionResult } from "@vphys/core";
import { createPropertyStore } from "@vphys/kv3";
import type { ExtractConfig } from "./config.js";
import { Reporter, errorMessage } from "./reporter.js";

export interface DocumentReport {
  file: string;
  /** Path written, when the document produced triangles and the write succeeded. */
  output?: string;
  result?: ExtractionResult;
  error?: string;
}

export interface RunSummary {
  documents: number;
  written: number;
  /** Documents with no qualifying triangles. */
  empty: number;
  failed: number;
  triangles: number;
  reports: DocumentReport[];
}

/** Files in `dir` ending in `extension` (case-insensitive), sorted by name. */
export function discoverDocuments(dir: string, extension: string): string[] {
  const wanted = extension.toLowerCase();
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === wanted)
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/** Output path for a document: same stem, `.tri` extension. */
export function outputPathFor(file: string, outputDir: string): string {
  return path.join(outputDir, `${path.parse(file).name}.tri`);
}

/** Parse and extract one document held in memory. */
export function processDocument(
  text: string,
  config: Pick<ExtractConfig, "group" | "maxFaceEdges" | "tail">,
): ExtractionResult {
  const store = createPropertyStore(text);
  return extractCollision(store, {
    group: config.group,
    maxFaceEdges: config.maxFaceEdges,
    tail: config.tail,
  });
}

function reportResult(result: ExtractionResult, reporter: Reporter): void {
  reporter.info(`\nHulls: ${result.hulls.total} (Total)`);
  reporter.info(`\nFound ${result.hulls.extracted} hulls with valid collision attributes`);
  reporter.info(`\nMeshes: ${result.meshes.total} (Total)`);
  reporter.info(`\nFound ${result.meshes.extracted} meshes with valid collision attributes`);

  for (const entry of result.entries) {
    if (entry.status === "skipped") {
      const detail = entry.detail ? ` (${entry.detail})` : "";
      reporter.detail(`  skipped ${entry.kind} ${entry.index}: ${entry.reason} in ${entry.field}${detail}`);
    } else if (entry.status === "extracted") {
      reporter.detail(`  ${entry.kind} ${entry.index}: ${entry.triangles} triangles`);
    }
  }

  reporter.info(`Total triangles found: ${result.triangles.length}`);
}

function ensureDirectories(config: ExtractConfig, reporter: Reporter): void {
  if (!fs.existsSync(config.inputDir)) {
    fs.mkdirSync(config.inputDir, { recursive: true });
    reporter.info(
      `Created input directory. Please place your ${config.extension} files in the ${config.inputDir} directory.`,
    );
  }
  fs.mkdirSync(config.outputDir, { recursive: true });
}

/**
 * Run extraction over the input directory.
 *
 * A document that fails to read or parse, or whose output cannot be
 * written, is reported and the run moves on to the next one.
 */
export function runExtract(config: ExtractConfig, reporter: Reporter = new Reporter(config.verbosity)): RunSummary {
  ensureDirectories(config, reporter);

  const summary: RunSummary = {
    documents: 0,
    written: 0,
    empty: 0,
    failed: 0,
    triangles: 0,
    reports: [],
  };

  const files = discoverDocuments(config.inputDir, config.extension);
  if (files.length === 0) {
    reporter.info(`No ${config.extension} files found in ${config.inputDir}`);
  }

  for (const file of files) {
    summary.documents++;
    const report: DocumentReport = { file };
    summary.reports.push(report);
    reporter.info(`\nProcessing ${path.basename(file)}...`);

    let result: ExtractionResult;
    try {
      result = processDocument(fs.readFileSync(file, "utf8"), config);
    } catch (error) {
      report.error = errorMessage(error);
      summary.failed++;
      reporter.error(`Error: Could not process ${file}: ${report.error}`);
      continue;
    }
    report.result = result;
    reportResult(result, reporter);

    if (result.triangles.length === 0) {
      summary.empty++;
      reporter.info("No triangles found, skipping file write");
      continue;
    }

    const outputPath = outputPathFor(file, config.outputDir);
    try {
      fs.writeFileSync(outputPath, toTriBytes(result.triangles));
    } catch (error) {
      report.error = errorMessage(error);
      summary.failed++;
      reporter.error(`Error: Could not open output file ${outputPath}`);
      continue;
    }

    report.output = outputPath;
    summary.written++;
    summary.triangles += result.triangles.length;
    reporter.info(`Processed file: ${file} -> ${outputPath}`);
  }

  reporter.info(
    `\nDone: ${summary.written} written, ${summary.empty} without triangles, ${summary.failed} failed`,
  );
  return summary;
}
