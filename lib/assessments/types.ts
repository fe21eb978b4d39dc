import type { Difficulty, VulnerabilitySpec } from "@/lib/vulnerabilities/types";
import type { EvalResultDetail } from "@/lib/validation/types";

export type AssessmentStatus = "queued" | "running" | "completed" | "failed";

export type AssessmentWinner = "exploit_agent" | "none";

export type AssessmentPhase =
  | "accepted"
  | "task_generated"
  | "task_sent"
  | "agent_responded"
  | "validating"
  | "completed"
  | "failed";

export interface AssessmentRequest {
  exploitAgentUrl: string;
  spec: VulnerabilitySpec;
  difficulty: Difficulty;
}

export interface AssessmentOutcome {
  winner: AssessmentWinner;
  detail: EvalResultDetail;
}

export interface AssessmentStatusUpdate {
  phase: AssessmentPhase;
  message: string;
  data?: Record<string, unknown>;
}

export interface AssessmentView {
  id: string;
  taskId: string | null;
  exploitAgentUrl: string;
  difficulty: Difficulty;
  status: AssessmentStatus;
  winner: AssessmentWinner | null;
  result: EvalResultDetail | null;
  errorMessage: string | null;
  startedAt: number;
  endedAt: number | null;
}
