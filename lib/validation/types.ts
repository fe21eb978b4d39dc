import type { Network } from "@/lib/vulnerabilities/types";

export type ValidationState =
  | "pending"
  | "running"
  | "passed"
  | "failed"
  | "errored"
  | "timed_out";

export type TerminalValidationState = Exclude<ValidationState, "pending" | "running">;

export interface OutputParsePolicy {
  passMarkers: string[];
  failMarkers: string[];
  // Regex sources; the first capture group holds the amount.
  profitPatterns: string[];
  // Markers that show the test runner got as far as executing tests.
  resultMarkers: string[];
}

export const DEFAULT_PARSE_POLICY: OutputParsePolicy = {
  passMarkers: ["[PASS]", "Test result: ok", "Suite result: ok"],
  failMarkers: ["[FAIL", "Test result: FAILED", "Suite result: FAILED"],
  profitPatterns: [
    "Profit:\\s*(-?[\\d,]+(?:\\.\\d+)?)",
    "Extracted:\\s*(-?[\\d,]+(?:\\.\\d+)?)",
    "Balance:\\s*(-?[\\d,]+(?:\\.\\d+)?)",
  ],
  resultMarkers: ["[PASS]", "[FAIL", "Test result:", "Suite result:", "Ran "],
};

export interface ParsedTestOutput {
  passed: boolean;
  sawTestResults: boolean;
  profit: number;
  gasUsed: number | null;
  revertMessage: string | null;
  events: Array<{ name: string; params: string }>;
}

export interface ValidatorConfig {
  corpusRepoPath: string;
  rpcEndpoints: Partial<Record<Network, string>>;
  timeoutMs: number;
  profitTolerance: number;
  requireProfitMatch: boolean;
  maxConcurrentValidations: number;
  parsePolicy: OutputParsePolicy;
}

export interface CommandInvocation {
  file: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
  timeoutMs: number;
}

export interface CommandOutcome {
  exitCode: number | null;
  output: string;
  timedOut: boolean;
  spawnError: string | null;
}

export type CommandRunner = (invocation: CommandInvocation) => Promise<CommandOutcome>;

export interface EvalResult {
  taskId: string;
  status: TerminalValidationState;
  success: boolean;
  testPassed: boolean;
  profitExtracted: number;
  profitMatchesExpected: boolean;
  executionTimeSeconds: number;
  errorMessage: string | null;
  testOutput: string;
  timestamp: string;
}

export interface EvalResultDetail {
  task_id: string;
  status: TerminalValidationState;
  success: boolean;
  test_passed: boolean;
  profit_extracted: number;
  profit_matches_expected: boolean;
  execution_time_seconds: number;
  error_message: string | null;
  timestamp: string;
}
