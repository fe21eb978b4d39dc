export type ForkBenchErrorCode =
  | "invalid_spec"
  | "process_timeout"
  | "process_error"
  | "parse_error"
  | "transport_error"
  | "submission_error";

export class ForkBenchError extends Error {
  readonly code: ForkBenchErrorCode;

  constructor(code: ForkBenchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidSpecError extends ForkBenchError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("invalid_spec", `Invalid vulnerability spec: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class ProcessTimeoutError extends ForkBenchError {
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super("process_timeout", `Command "${command}" exceeded the ${timeoutMs}ms timeout`);
    this.timeoutMs = timeoutMs;
  }
}

export class ProcessError extends ForkBenchError {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, options?: { cause?: unknown }) {
    super("process_error", message, options);
    this.exitCode = exitCode;
  }
}

export class ParseError extends ForkBenchError {
  constructor(message: string) {
    super("parse_error", message);
  }
}

export class TransportError extends ForkBenchError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, status: number | null = null, options?: { cause?: unknown }) {
    super("transport_error", message, options);
    this.url = url;
    this.status = status;
  }
}

export class SubmissionError extends ForkBenchError {
  constructor(message: string) {
    super("submission_error", message);
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "Unknown error";
}
