/**
 * `inspect` and `convert` — look at `.tri` files after extraction.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { computeTriangleStats, parseTri, toStlBytes, type TriangleStats, type Vector3 } from "@vphys/core";
import { Reporter, errorMessage } from "./reporter.js";

export interface InspectArgs {
  input: string;
  json: boolean;
}

export interface ConvertArgs {
  input: string;
  /** Defaults to the input path with a `.stl` extension. */
  output?: string;
}

function formatVector(v: Vector3): string {
  return `(${v.x.toFixed(3)}, ${v.y.toFixed(3)}, ${v.z.toFixed(3)})`;
}

export function formatStats(file: string, bytes: number, stats: TriangleStats): string[] {
  const lines = [
    `File: ${path.basename(file)}`,
    `Size: ${(bytes / 1024).toFixed(1)} KB`,
    `Triangles: ${stats.triangleCount}`,
  ];
  if (stats.bounds) {
    lines.push(`Bounds min: ${formatVector(stats.bounds.min)}`);
    lines.push(`Bounds max: ${formatVector(stats.bounds.max)}`);
  }
  lines.push(`Surface area: ${stats.surfaceArea.toFixed(3)}`);
  lines.push(`Degenerate triangles: ${stats.degenerateCount}`);
  return lines;
}

export function runInspect(args: InspectArgs, reporter: Reporter = new Reporter()): number {
  const inputPath = path.resolve(args.input);
  if (!fs.existsSync(inputPath)) {
    reporter.error(`Error: Input file not found: ${inputPath}`);
    return 1;
  }

  try {
    const bytes = fs.readFileSync(inputPath);
    const stats = computeTriangleStats(parseTri(bytes));

    if (args.json) {
      console.log(JSON.stringify({ file: inputPath, bytes: bytes.length, ...stats }, null, 2));
    } else {
      for (const line of formatStats(inputPath, bytes.length, stats)) {
        reporter.info(line);
      }
    }
    return 0;
  } catch (error) {
    reporter.error(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

export function runConvert(args: ConvertArgs, reporter: Reporter = new Reporter()): number {
  const inputPath = path.resolve(args.input);
  if (!fs.existsSync(inputPath)) {
    reporter.error(`Error: Input file not found: ${inputPath}`);
    return 1;
  }

  const parsed = path.parse(inputPath);
  const outputPath = path.resolve(args.output ?? path.join(parsed.dir, `${parsed.name}.stl`));

  try {
    const triangles = parseTri(fs.readFileSync(inputPath));
    const stl = toStlBytes(triangles, parsed.name);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, stl);
    reporter.info(`Wrote ${triangles.length} triangles to ${outputPath}`);
    return 0;
  } catch (error) {
    reporter.error(`Error: ${errorMessage(error)}`);
    return 1;
  }
}
