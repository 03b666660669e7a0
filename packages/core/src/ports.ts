import type { CandidateSpan } from "./types.js";

/** Proposes PERSON candidate spans for a text. */
export interface EntityRecognizer {
  recognize(text: string): CandidateSpan[];
}

/** Platform-agnostic logging interface. */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Recognizer used when no name model is available: proposes nothing. */
export class NullRecognizer implements EntityRecognizer {
  recognize(): CandidateSpan[] {
    return [];
  }
}

/** Logger writing prefixed lines to stderr, keeping stdout for results. */
export class ConsoleLogger implements Logger {
  private prefix: string;

  constructor(prefix = "[lai-pii]") {
    this.prefix = prefix;
  }

  info(message: string): void {
    console.error(`${this.prefix} ${message}`);
  }

  warn(message: string): void {
    console.error(`${this.prefix} warning: ${message}`);
  }

  error(message: string): void {
    console.error(`${this.prefix} error: ${message}`);
  }
}

/** Logger that keeps every line in memory, for tests and offline inspection. */
export class MemoryLogger implements Logger {
  readonly lines: { level: "info" | "warn" | "error"; message: string }[] = [];

  info(message: string): void {
    this.lines.push({ level: "info", message });
  }

  warn(message: string): void {
    this.lines.push({ level: "warn", message });
  }

  error(message: string): void {
    this.lines.push({ level: "error", message });
  }
}
