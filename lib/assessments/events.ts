import { and, asc, eq, gt, max } from "drizzle-orm";
import { getDb } from "@/lib/db/client";
import { assessmentEvents } from "@/lib/db/schema";
import type { AssessmentPhase, AssessmentStatusUpdate } from "@/lib/assessments/types";

export interface PersistedAssessmentEvent {
  id: number;
  seq: number;
  eventType: AssessmentPhase;
  message: string;
  data: Record<string, unknown>;
  createdAt: number;
}

interface StoredPayload {
  message: string;
  data: Record<string, unknown>;
}

function isSeqConflict(error: unknown): boolean {
  const queue: unknown[] = [error];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current || typeof current !== "object") {
      continue;
    }

    const message =
      "message" in current && typeof current.message === "string" ? current.message.toLowerCase() : "";
    const code = "code" in current && typeof current.code === "string" ? current.code : "";

    if (
      code === "SQLITE_CONSTRAINT_UNIQUE" ||
      (message.includes("unique") && message.includes("assessment_events"))
    ) {
      return true;
    }

    if ("cause" in current) {
      queue.push(current.cause);
    }
  }

  return false;
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

const PHASES: readonly AssessmentPhase[] = [
  "accepted",
  "task_generated",
  "task_sent",
  "agent_responded",
  "validating",
  "completed",
  "failed",
];

function toPhase(value: string): AssessmentPhase {
  return PHASES.find((phase) => phase === value) ?? "failed";
}

function readPayload(json: string): StoredPayload {
  const parsed: unknown = JSON.parse(json);
  if (!parsed || typeof parsed !== "object") {
    return { message: "", data: {} };
  }

  const message = "message" in parsed && typeof parsed.message === "string" ? parsed.message : "";
  const data: Record<string, unknown> = {};
  if ("data" in parsed && parsed.data && typeof parsed.data === "object") {
    Object.assign(data, parsed.data);
  }

  return { message, data };
}

export async function appendAssessmentEvent(
  assessmentId: string,
  update: AssessmentStatusUpdate,
): Promise<number> {
  const db = await getDb();
  const maxAttempts = 24;
  const payload: StoredPayload = { message: update.message, data: update.data ?? {} };

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const [row] = await db
      .select({ lastSeq: max(assessmentEvents.seq) })
      .from(assessmentEvents)
      .where(eq(assessmentEvents.assessmentId, assessmentId));

    const seq = (row?.lastSeq ?? 0) + 1;

    try {
      await db.insert(assessmentEvents).values({
        assessmentId,
        seq,
        eventType: update.phase,
        payloadJson: JSON.stringify(payload),
        createdAt: Date.now(),
      });

      return seq;
    } catch (error) {
      if (attempt < maxAttempts - 1 && isSeqConflict(error)) {
        await sleep(Math.min(50, 2 * (attempt + 1)) + Math.floor(Math.random() * 4));
        continue;
      }
      throw error;
    }
  }

  throw new Error("Failed to append assessment event after retries.");
}

export async function getAssessmentEventsAfter(
  assessmentId: string,
  afterId: number,
  limit = 100,
): Promise<PersistedAssessmentEvent[]> {
  const db = await getDb();

  const rows = await db
    .select()
    .from(assessmentEvents)
    .where(and(eq(assessmentEvents.assessmentId, assessmentId), gt(assessmentEvents.id, afterId)))
    .orderBy(asc(assessmentEvents.id))
    .limit(limit);

  return rows.map((row) => {
    const payload = readPayload(row.payloadJson);
    return {
      id: row.id,
      seq: row.seq,
      eventType: toPhase(row.eventType),
      message: payload.message,
      data: payload.data,
      createdAt: row.createdAt,
    };
  });
}
