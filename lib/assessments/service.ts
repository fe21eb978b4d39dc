import { nanoid } from "nanoid";
import { desc, eq } from "drizzle-orm";
import { z } from "zod";
import { getDb } from "@/lib/db/client";
import { assessments, type AssessmentRow } from "@/lib/db/schema";
import type {
  AssessmentOutcome,
  AssessmentRequest,
  AssessmentStatus,
  AssessmentView,
  AssessmentWinner,
} from "@/lib/assessments/types";
import type { EvalResultDetail } from "@/lib/validation/types";
import { isDifficulty } from "@/lib/vulnerabilities/types";

const evalResultDetailSchema = z.object({
  task_id: z.string(),
  status: z.enum(["passed", "failed", "errored", "timed_out"]),
  success: z.boolean(),
  test_passed: z.boolean(),
  profit_extracted: z.number(),
  profit_matches_expected: z.boolean(),
  execution_time_seconds: z.number(),
  error_message: z.string().nullable(),
  timestamp: z.string(),
});

const STATUSES: readonly AssessmentStatus[] = ["queued", "running", "completed", "failed"];

function toStatus(value: string): AssessmentStatus {
  return STATUSES.find((status) => status === value) ?? "failed";
}

function toWinner(value: string | null): AssessmentWinner | null {
  if (value === "exploit_agent" || value === "none") {
    return value;
  }

  return null;
}

function readResult(json: string | null): EvalResultDetail | null {
  if (!json) {
    return null;
  }

  const parsed = evalResultDetailSchema.safeParse(JSON.parse(json));
  return parsed.success ? parsed.data : null;
}

function toView(row: AssessmentRow): AssessmentView {
  return {
    id: row.id,
    taskId: row.taskId,
    exploitAgentUrl: row.exploitAgentUrl,
    difficulty: isDifficulty(row.difficulty) ? row.difficulty : "easy",
    status: toStatus(row.status),
    winner: toWinner(row.winner),
    result: readResult(row.resultJson),
    errorMessage: row.errorMessage,
    startedAt: row.startedAt,
    endedAt: row.endedAt,
  };
}

export async function createAssessment(
  request: AssessmentRequest,
  rawRequest: unknown,
): Promise<{ assessmentId: string }> {
  const db = await getDb();
  const assessmentId = nanoid();

  await db.insert(assessments).values({
    id: assessmentId,
    taskId: null,
    exploitAgentUrl: request.exploitAgentUrl,
    requestJson: JSON.stringify(rawRequest),
    difficulty: request.difficulty,
    status: "queued",
    startedAt: Date.now(),
  });

  return { assessmentId };
}

export async function updateAssessmentStatus(
  assessmentId: string,
  status: AssessmentStatus,
): Promise<void> {
  const db = await getDb();
  await db.update(assessments).set({ status }).where(eq(assessments.id, assessmentId));
}

export async function recordAssessmentTask(assessmentId: string, taskId: string): Promise<void> {
  const db = await getDb();
  await db.update(assessments).set({ taskId }).where(eq(assessments.id, assessmentId));
}

export async function finalizeAssessment(
  assessmentId: string,
  outcome: AssessmentOutcome,
  options: { failed: boolean },
): Promise<void> {
  const db = await getDb();

  await db
    .update(assessments)
    .set({
      status: options.failed ? "failed" : "completed",
      winner: outcome.winner,
      resultJson: JSON.stringify(outcome.detail),
      errorMessage: outcome.detail.error_message,
      endedAt: Date.now(),
    })
    .where(eq(assessments.id, assessmentId));
}

export async function failAssessment(assessmentId: string, errorMessage: string): Promise<void> {
  const db = await getDb();
  await db
    .update(assessments)
    .set({ status: "failed", winner: "none", errorMessage, endedAt: Date.now() })
    .where(eq(assessments.id, assessmentId));
}

export async function getAssessment(assessmentId: string): Promise<AssessmentView | null> {
  const db = await getDb();
  const [row] = await db.select().from(assessments).where(eq(assessments.id, assessmentId)).limit(1);
  return row ? toView(row) : null;
}

export async function listAssessments(limit = 50): Promise<AssessmentView[]> {
  const db = await getDb();
  const rows = await db.select().from(assessments).orderBy(desc(assessments.startedAt)).limit(limit);
  return rows.map(toView);
}
