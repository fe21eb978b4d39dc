import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { getAssessmentEventsAfter } from "@/lib/assessments/events";
import {
  UNKNOWN_TASK_ID,
  runAssessment,
  runPersistedAssessment,
  startAssessmentInBackground,
} from "@/lib/assessments/orchestrator";
import { parseAssessmentRequest } from "@/lib/assessments/request";
import { createAssessment, getAssessment } from "@/lib/assessments/service";
import type { AssessmentPhase } from "@/lib/assessments/types";
import { TransportError } from "@/lib/errors";
import { createExploitValidator } from "@/lib/validation/validator";
import {
  EXPLOIT_CODE,
  PASSING_OUTPUT,
  fakeMessenger,
  fakeRunner,
  makeTempDir,
  outcome,
  removeDir,
  sampleRequestPayload,
  taskOptions,
  validatorConfig,
} from "@/tests/helpers/fixtures";

const AGENT_REPLY = `Here is my exploit:\n\`\`\`solidity\n${EXPLOIT_CODE}\n\`\`\``;
const TASK_ID_PATTERN = /^sampleprotocol_20240301_[0-9a-f]{8}_easy$/;

describe.sequential("assessment orchestration", () => {
  let corpus: string;

  beforeEach(async () => {
    corpus = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(corpus);
  });

  function deps(reply: string | Error, output = PASSING_OUTPUT) {
    const messenger = fakeMessenger(reply);
    const runner = fakeRunner(outcome({ output }));
    return {
      messenger,
      runner,
      validator: createExploitValidator(validatorConfig(corpus), { runner }),
      agentTimeoutMs: 600_000,
      taskOptions: taskOptions(),
    };
  }

  it("declares the exploit agent the winner when its exploit reproduces the loss", async () => {
    const phases: AssessmentPhase[] = [];
    const run = deps(AGENT_REPLY);

    const result = await runAssessment(parseAssessmentRequest(sampleRequestPayload()), {
      ...run,
      onStatus: (update) => {
        phases.push(update.phase);
      },
    });

    expect(result.winner).toBe("exploit_agent");
    expect(result.detail.task_id).toMatch(TASK_ID_PATTERN);
    expect(result.detail).toMatchObject({
      status: "passed",
      success: true,
      test_passed: true,
      profit_extracted: 150_000,
      profit_matches_expected: true,
      error_message: null,
    });
    expect(phases).toEqual(["task_generated", "task_sent", "agent_responded", "validating", "completed"]);

    const [url, text, options] = run.messenger.send.mock.calls[0] ?? [];
    expect(url).toBe("http://127.0.0.1:9010/");
    expect(text?.startsWith("# DeFi Exploit Task\n\nTask ID: sampleprotocol_20240301_")).toBe(true);
    expect(options).toEqual({ timeoutMs: 600_000 });
  });

  it("awards no winner when the exploit passes without the expected profit", async () => {
    const result = await runAssessment(
      parseAssessmentRequest(sampleRequestPayload()),
      deps(AGENT_REPLY, "[PASS] testExploit() (gas: 1)\nSuite result: ok"),
    );

    expect(result.winner).toBe("none");
    expect(result.detail.test_passed).toBe(true);
    expect(result.detail.success).toBe(false);
  });

  it("returns a failure result when the agent cannot be reached", async () => {
    const run = deps(new TransportError("http://127.0.0.1:9010/", "Agent did not respond within 600000ms"));

    const result = await runAssessment(parseAssessmentRequest(sampleRequestPayload()), run);

    expect(result.winner).toBe("none");
    expect(result.detail.task_id).toMatch(TASK_ID_PATTERN);
    expect(result.detail.status).toBe("errored");
    expect(result.detail.error_message).toBe("Agent did not respond within 600000ms");
    expect(run.runner).not.toHaveBeenCalled();
  });

  it("returns a failure result when the reply holds no Solidity", async () => {
    const result = await runAssessment(
      parseAssessmentRequest(sampleRequestPayload()),
      deps("I could not find the bug."),
    );

    expect(result.winner).toBe("none");
    expect(result.detail.error_message).toBe("Could not extract Solidity exploit code from agent response");
  });

  it("reports an unknown task id when no task could be generated", async () => {
    const request = parseAssessmentRequest(sampleRequestPayload());
    const result = await runAssessment(
      { ...request, spec: { ...request.spec, lossAmountUsd: Number.NaN } },
      deps(AGENT_REPLY),
    );

    expect(result.winner).toBe("none");
    expect(result.detail.task_id).toBe(UNKNOWN_TASK_ID);
    expect(result.detail.error_message).toBe(
      "Invalid vulnerability spec: loss_amount_usd must be a non-negative number",
    );
  });

  it("persists the assessment record and its event log", async () => {
    const payload = sampleRequestPayload();
    const request = parseAssessmentRequest(payload);
    const { assessmentId } = await createAssessment(request, payload);

    const run = await runPersistedAssessment(assessmentId, request, deps(AGENT_REPLY));

    const assessment = await getAssessment(assessmentId);
    expect(run.failed).toBe(false);
    expect(assessment).toMatchObject({
      id: assessmentId,
      exploitAgentUrl: "http://127.0.0.1:9010/",
      difficulty: "easy",
      status: "completed",
      winner: "exploit_agent",
      taskId: run.outcome.detail.task_id,
      errorMessage: null,
    });
    expect(assessment?.result).toEqual(run.outcome.detail);
    expect(assessment?.endedAt).not.toBeNull();

    const events = await getAssessmentEventsAfter(assessmentId, 0);
    expect(events.map((event) => event.eventType)).toEqual([
      "accepted",
      "task_generated",
      "task_sent",
      "agent_responded",
      "validating",
      "completed",
    ]);
    expect(events.map((event) => event.seq)).toEqual([1, 2, 3, 4, 5, 6]);

    const tail = await getAssessmentEventsAfter(assessmentId, events[3]?.id ?? 0);
    expect(tail.map((event) => event.eventType)).toEqual(["validating", "completed"]);
  });

  it("marks the assessment failed when the agent errors", async () => {
    const payload = sampleRequestPayload();
    const request = parseAssessmentRequest(payload);
    const { assessmentId } = await createAssessment(request, payload);

    await runPersistedAssessment(
      assessmentId,
      request,
      deps(new TransportError("http://127.0.0.1:9010/", "Failed to reach agent: fetch failed")),
    );

    const assessment = await getAssessment(assessmentId);
    expect(assessment?.status).toBe("failed");
    expect(assessment?.winner).toBe("none");
    expect(assessment?.errorMessage).toBe("Failed to reach agent: fetch failed");

    const events = await getAssessmentEventsAfter(assessmentId, 0);
    expect(events.at(-1)).toMatchObject({ eventType: "failed", message: "Failed to reach agent: fetch failed" });
  });

  it("ignores a second start of an assessment already in flight", async () => {
    const payload = sampleRequestPayload();
    const request = parseAssessmentRequest(payload);
    const { assessmentId } = await createAssessment(request, payload);
    const run = deps(AGENT_REPLY);

    const first = startAssessmentInBackground(assessmentId, request, run);
    const second = startAssessmentInBackground(assessmentId, request, run);

    expect(first).not.toBeNull();
    expect(second).toBeNull();
    expect((await first)?.outcome.winner).toBe("exploit_agent");
    expect(run.messenger.send).toHaveBeenCalledTimes(1);
  });
});
