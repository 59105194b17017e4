import type { Verbosity } from "./config.js";

/** Console output with a verbosity gate. Errors always print. */
export class Reporter {
  readonly verbosity: Verbosity;

  constructor(verbosity: Verbosity = "normal") {
    this.verbosity = verbosity;
  }

  /** Progress and summaries. */
  info(message: string): void {
    if (this.verbosity !== "quiet") console.log(message);
  }

  /** Per-entry detail, only with --verbose. */
  detail(message: string): void {
    if (this.verbosity === "verbose") console.log(message);
  }

  warn(message: string): void {
    if (this.verbosity !== "quiet") console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
