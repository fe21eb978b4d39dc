import { buildTaskMessage } from "@/lib/agents/task-message";
import type { Messenger } from "@/lib/agents/messenger";
import { extractExploitCode } from "@/lib/agents/submission";
import { appendAssessmentEvent } from "@/lib/assessments/events";
import {
  failAssessment,
  finalizeAssessment,
  recordAssessmentTask,
  updateAssessmentStatus,
} from "@/lib/assessments/service";
import type {
  AssessmentOutcome,
  AssessmentRequest,
  AssessmentStatusUpdate,
} from "@/lib/assessments/types";
import { SubmissionError, asErrorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logging/logger";
import { generateTask } from "@/lib/tasks/generator";
import type { GeneratedTask, TaskGenerationOptions } from "@/lib/tasks/types";
import type { EvalResult, EvalResultDetail } from "@/lib/validation/types";
import type { ExploitValidator } from "@/lib/validation/validator";

const logger = createLogger("orchestrator");

const activeAssessments = new Set<string>();

export const UNKNOWN_TASK_ID = "unknown";

export interface AssessmentDeps {
  messenger: Messenger;
  validator: ExploitValidator;
  agentTimeoutMs: number;
  taskOptions?: TaskGenerationOptions;
  now?: () => Date;
  onStatus?: (update: AssessmentStatusUpdate) => void | Promise<void>;
}

export interface AssessmentRun {
  outcome: AssessmentOutcome;
  failed: boolean;
}

export function toResultDetail(result: EvalResult): EvalResultDetail {
  return {
    task_id: result.taskId,
    status: result.status,
    success: result.success,
    test_passed: result.testPassed,
    profit_extracted: result.profitExtracted,
    profit_matches_expected: result.profitMatchesExpected,
    execution_time_seconds: result.executionTimeSeconds,
    error_message: result.errorMessage,
    timestamp: result.timestamp,
  };
}

export function failureDetail(taskId: string, message: string, at: Date): EvalResultDetail {
  return {
    task_id: taskId,
    status: "errored",
    success: false,
    test_passed: false,
    profit_extracted: 0,
    profit_matches_expected: false,
    execution_time_seconds: 0,
    error_message: message,
    timestamp: at.toISOString(),
  };
}

async function executeAssessment(
  request: AssessmentRequest,
  deps: AssessmentDeps,
): Promise<AssessmentRun> {
  const now = deps.now ?? (() => new Date());
  const emit = async (update: AssessmentStatusUpdate): Promise<void> => {
    logger.info(update.message, { phase: update.phase, ...update.data });
    await deps.onStatus?.(update);
  };

  let task: GeneratedTask | null = null;

  try {
    task = generateTask(request.spec, request.difficulty, deps.taskOptions);
    await emit({
      phase: "task_generated",
      message: `Generated task ${task.taskId} (${task.difficulty})`,
      data: { taskId: task.taskId, difficulty: task.difficulty, contractPath: task.spec.contractPath },
    });

    await emit({
      phase: "task_sent",
      message: `Sending task to exploit agent at ${request.exploitAgentUrl}`,
      data: { taskId: task.taskId },
    });
    const reply = await deps.messenger.send(request.exploitAgentUrl, buildTaskMessage(task), {
      timeoutMs: deps.agentTimeoutMs,
    });

    await emit({
      phase: "agent_responded",
      message: `Received response from exploit agent (${reply.text.length} chars)`,
      data: { taskId: task.taskId, latencyMs: reply.latencyMs },
    });

    const exploitCode = extractExploitCode(reply.text);
    if (exploitCode === null) {
      throw new SubmissionError("Could not extract Solidity exploit code from agent response");
    }

    await emit({
      phase: "validating",
      message: "Running exploit against forked chain state",
      data: { taskId: task.taskId },
    });
    const result = await deps.validator.validate(task, { exploitCode });
    const outcome: AssessmentOutcome = {
      winner: result.success ? "exploit_agent" : "none",
      detail: toResultDetail(result),
    };

    await emit({
      phase: "completed",
      message: `Assessment finished: ${result.status}, winner ${outcome.winner}`,
      data: { taskId: task.taskId, status: result.status, success: result.success },
    });

    return { outcome, failed: false };
  } catch (error) {
    const message = asErrorMessage(error);
    const taskId = task?.taskId ?? UNKNOWN_TASK_ID;
    logger.error("Assessment failed", { taskId, error: message });

    try {
      await deps.onStatus?.({ phase: "failed", message, data: { taskId } });
    } catch (statusError) {
      logger.warn("Failed to report assessment failure", { taskId, error: asErrorMessage(statusError) });
    }

    return {
      outcome: { winner: "none", detail: failureDetail(taskId, message, now()) },
      failed: true,
    };
  }
}

export async function runAssessment(
  request: AssessmentRequest,
  deps: AssessmentDeps,
): Promise<AssessmentOutcome> {
  const run = await executeAssessment(request, deps);
  return run.outcome;
}

export async function runPersistedAssessment(
  assessmentId: string,
  request: AssessmentRequest,
  deps: AssessmentDeps,
): Promise<AssessmentRun> {
  await updateAssessmentStatus(assessmentId, "running");
  await appendAssessmentEvent(assessmentId, {
    phase: "accepted",
    message: `Assessment accepted for ${request.spec.projectName}`,
    data: { exploitAgentUrl: request.exploitAgentUrl, difficulty: request.difficulty },
  });

  const run = await executeAssessment(request, {
    ...deps,
    onStatus: async (update) => {
      if (update.phase === "task_generated" && typeof update.data?.taskId === "string") {
        await recordAssessmentTask(assessmentId, update.data.taskId);
      }
      await appendAssessmentEvent(assessmentId, update);
      await deps.onStatus?.(update);
    },
  });

  await finalizeAssessment(assessmentId, run.outcome, { failed: run.failed });
  return run;
}

export function startAssessmentInBackground(
  assessmentId: string,
  request: AssessmentRequest,
  deps: AssessmentDeps,
): Promise<AssessmentRun | null> | null {
  if (activeAssessments.has(assessmentId)) {
    return null;
  }

  activeAssessments.add(assessmentId);

  return runPersistedAssessment(assessmentId, request, deps)
    .catch(async (error: unknown) => {
      const message = asErrorMessage(error);
      logger.error("Background assessment crashed", { assessmentId, error: message });
      await failAssessment(assessmentId, message).catch((persistError: unknown) => {
        logger.error("Failed to persist assessment failure", {
          assessmentId,
          error: asErrorMessage(persistError),
        });
      });
      return null;
    })
    .finally(() => {
      activeAssessments.delete(assessmentId);
    });
}
