import pLimit from "p-limit";
import { stageSubmission, type StagedSubmission } from "@/lib/corpus/workspace";
import {
  ProcessError,
  ProcessTimeoutError,
  SubmissionError,
  asErrorMessage,
} from "@/lib/errors";
import { createLogger } from "@/lib/logging/logger";
import type { GeneratedTask } from "@/lib/tasks/types";
import { parseTestOutput } from "@/lib/validation/output-parser";
import { runCommand, tokenizeCommand } from "@/lib/validation/process-runner";
import { isSuccessfulRun, profitMatchesExpected } from "@/lib/validation/profit";
import type {
  CommandInvocation,
  CommandRunner,
  EvalResult,
  TerminalValidationState,
  ValidationState,
  ValidatorConfig,
} from "@/lib/validation/types";
import { NETWORK_RPC_ENV, NETWORKS } from "@/lib/vulnerabilities/types";

const logger = createLogger("validator");

const FFI_FLAG_PATTERN = /^--ffi(?:=.*)?$/;

export interface ValidateOptions {
  exploitCode?: string;
  onStateChange?: (state: ValidationState) => void;
}

export interface ExploitValidator {
  readonly config: ValidatorConfig;
  validate(task: GeneratedTask, options?: ValidateOptions): Promise<EvalResult>;
}

export interface ValidatorDeps {
  runner?: CommandRunner;
  now?: () => Date;
}

interface RunSummary {
  status: TerminalValidationState;
  testPassed: boolean;
  profitExtracted: number;
  errorMessage: string | null;
  testOutput: string;
}

export function buildTestInvocation(task: GeneratedTask, config: ValidatorConfig): CommandInvocation {
  const tokens = tokenizeCommand(task.spec.testCommand);
  const contractPath = task.spec.contractPath.replace(/^\.\//, "");
  // Submitted Solidity is untrusted, so cheatcodes that run host commands stay off.
  const args =
    tokens[0] === "forge" && tokens[1] === "test"
      ? tokens.slice(1).filter((arg) => !FFI_FLAG_PATTERN.test(arg))
      : ["test", "--contracts", `./${contractPath}`, "-vvv"];

  const env: Record<string, string> = { FOUNDRY_FFI: "false" };
  for (const network of NETWORKS) {
    const url = config.rpcEndpoints[network];
    if (url) {
      env[NETWORK_RPC_ENV[network]] = url;
    }
  }

  return {
    file: "forge",
    args,
    cwd: config.corpusRepoPath,
    env,
    timeoutMs: config.timeoutMs,
  };
}

function lastMeaningfulLine(output: string): string | null {
  const lines = output
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
  return lines.at(-1) ?? null;
}

async function executeTests(
  task: GeneratedTask,
  config: ValidatorConfig,
  runner: CommandRunner,
): Promise<RunSummary> {
  const invocation = buildTestInvocation(task, config);
  const commandLine = [invocation.file, ...invocation.args].join(" ");

  logger.info("Running test command", { taskId: task.taskId, command: commandLine, cwd: invocation.cwd });
  const outcome = await runner(invocation);

  if (outcome.timedOut) {
    return {
      status: "timed_out",
      testPassed: false,
      profitExtracted: 0,
      errorMessage: new ProcessTimeoutError(commandLine, config.timeoutMs).message,
      testOutput: outcome.output,
    };
  }

  if (outcome.spawnError) {
    return {
      status: "errored",
      testPassed: false,
      profitExtracted: 0,
      errorMessage: new ProcessError(`Failed to start ${invocation.file}: ${outcome.spawnError}`, null).message,
      testOutput: outcome.output,
    };
  }

  const parsed = parseTestOutput(outcome.output, config.parsePolicy);

  if (outcome.exitCode !== 0 && !parsed.sawTestResults) {
    const reason = parsed.revertMessage ?? lastMeaningfulLine(outcome.output) ?? "no output";
    return {
      status: "errored",
      testPassed: false,
      profitExtracted: parsed.profit,
      errorMessage: new ProcessError(
        `${commandLine} exited with code ${String(outcome.exitCode)}: ${reason}`,
        outcome.exitCode,
      ).message,
      testOutput: outcome.output,
    };
  }

  const testPassed = parsed.passed && outcome.exitCode === 0;

  return {
    status: testPassed ? "passed" : "failed",
    testPassed,
    profitExtracted: parsed.profit,
    errorMessage: testPassed ? null : parsed.revertMessage,
    testOutput: outcome.output,
  };
}

async function restoreSubmission(taskId: string, staged: StagedSubmission | null): Promise<void> {
  if (!staged) {
    return;
  }

  try {
    await staged.restore();
  } catch (error) {
    logger.error("Failed to restore corpus file after validation", {
      taskId,
      path: staged.targetPath,
      backupPath: staged.backupPath,
      error: asErrorMessage(error),
    });
  }
}

export function createExploitValidator(
  config: ValidatorConfig,
  deps: ValidatorDeps = {},
): ExploitValidator {
  const runner = deps.runner ?? runCommand;
  const now = deps.now ?? (() => new Date());
  const limit = pLimit(config.maxConcurrentValidations);

  async function runValidation(task: GeneratedTask, options: ValidateOptions): Promise<EvalResult> {
    const startedAt = now();
    const transition = (state: ValidationState): void => {
      logger.debug("Validation state changed", { taskId: task.taskId, state });
      options.onStateChange?.(state);
    };

    transition("pending");

    const finish = (summary: RunSummary): EvalResult => {
      const finishedAt = now();
      const profitMatches = profitMatchesExpected(
        summary.profitExtracted,
        task.expectedProfitUsd,
        config.profitTolerance,
      );

      transition(summary.status);
      logger.info("Validation finished", {
        taskId: task.taskId,
        status: summary.status,
        profit: summary.profitExtracted,
      });

      return Object.freeze({
        taskId: task.taskId,
        status: summary.status,
        success: isSuccessfulRun({
          testPassed: summary.testPassed,
          profitMatches,
          expectedProfit: task.expectedProfitUsd,
          requireProfitMatch: config.requireProfitMatch,
        }),
        testPassed: summary.testPassed,
        profitExtracted: summary.profitExtracted,
        profitMatchesExpected: profitMatches,
        executionTimeSeconds: Math.max(0, finishedAt.getTime() - startedAt.getTime()) / 1000,
        errorMessage: summary.errorMessage,
        testOutput: summary.testOutput,
        timestamp: finishedAt.toISOString(),
      });
    };

    const errored = (message: string): EvalResult =>
      finish({
        status: "errored",
        testPassed: false,
        profitExtracted: 0,
        errorMessage: message,
        testOutput: "",
      });

    if (options.exploitCode !== undefined && !options.exploitCode.trim()) {
      return errored(new SubmissionError("No exploit code provided").message);
    }

    let staged: StagedSubmission | null = null;
    try {
      if (options.exploitCode !== undefined) {
        staged = await stageSubmission(config.corpusRepoPath, task.spec.contractPath, options.exploitCode);
        logger.info("Staged submission", { taskId: task.taskId, path: staged.targetPath });
      }
    } catch (error) {
      return errored(`Failed to stage submission: ${asErrorMessage(error)}`);
    }

    try {
      transition("running");
      return finish(await executeTests(task, config, runner));
    } catch (error) {
      logger.error("Test execution failed", { taskId: task.taskId, error: asErrorMessage(error) });
      return errored(new ProcessError(asErrorMessage(error), null, { cause: error }).message);
    } finally {
      await restoreSubmission(task.taskId, staged);
    }
  }

  return {
    config,
    validate(task, options = {}) {
      return limit(() => runValidation(task, options));
    },
  };
}
