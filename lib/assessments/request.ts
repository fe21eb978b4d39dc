import { z } from "zod";
import { InvalidSpecError } from "@/lib/errors";
import type { AssessmentRequest } from "@/lib/assessments/types";
import {
  DIFFICULTY_LEVELS,
  NETWORKS,
  VULNERABILITY_TYPES,
  isDifficulty,
  isNetwork,
  isVulnerabilityType,
} from "@/lib/vulnerabilities/types";

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const UTC_OFFSET_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;

const isoDateSchema = z.string().date();
const isoDateTimeSchema = z.string().datetime({ offset: true, local: true });

function isIsoTimestamp(value: string): boolean {
  return isoDateSchema.safeParse(value).success || isoDateTimeSchema.safeParse(value).success;
}

// Dates without a time are midnight UTC; date-times without an offset are read as UTC.
function toUtcDate(value: string): Date {
  if (DATE_ONLY_PATTERN.test(value)) {
    return new Date(`${value}T00:00:00Z`);
  }
  return new Date(UTC_OFFSET_PATTERN.test(value) ? value : `${value}Z`);
}

// Wire format uses snake_case keys; unknown keys are ignored.
export const assessmentRequestSchema = z.object({
  participants: z.object({
    exploit_agent: z.string().url(),
  }),
  config: z.object({
    project_name: z.string().trim().min(1, "project_name is required"),
    vulnerability_type: z.string(),
    network: z.string(),
    difficulty: z.string().default("easy"),
    loss_amount_usd: z.number().nonnegative().default(0),
    block_number: z.number().int().nonnegative().optional(),
    date: z.string().refine(isIsoTimestamp, "date must be an ISO-8601 date or date-time").optional(),
    contract_path: z.string().min(1).optional(),
    test_command: z.string().min(1).optional(),
    reference_links: z.array(z.string()).default([]),
    vulnerability_id: z.string().optional(),
    attacker_address: z.string().optional(),
    vulnerable_contract: z.string().optional(),
    transaction_hash: z.string().optional(),
  }),
});

export type AssessmentRequestInput = z.input<typeof assessmentRequestSchema>;

function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

export function parseAssessmentRequest(input: unknown): AssessmentRequest {
  const parsed = assessmentRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSpecError(formatZodIssues(parsed.error));
  }

  const { participants, config } = parsed.data;
  const { vulnerability_type: vulnerabilityType, network, difficulty } = config;
  const issues: string[] = [];

  if (!isVulnerabilityType(vulnerabilityType)) {
    issues.push(
      `Invalid vulnerability_type: ${vulnerabilityType}. Must be one of: ${VULNERABILITY_TYPES.join(", ")}`,
    );
  }
  if (!isNetwork(network)) {
    issues.push(`Invalid network: ${network}. Must be one of: ${NETWORKS.join(", ")}`);
  }
  if (!isDifficulty(difficulty)) {
    issues.push(`Invalid difficulty: ${difficulty}. Must be one of: ${DIFFICULTY_LEVELS.join(", ")}`);
  }

  const date = config.date ? toUtcDate(config.date) : undefined;
  if (date && Number.isNaN(date.getTime())) {
    issues.push("date must be a valid calendar date");
  }

  if (
    issues.length > 0 ||
    !isVulnerabilityType(vulnerabilityType) ||
    !isNetwork(network) ||
    !isDifficulty(difficulty)
  ) {
    throw new InvalidSpecError(issues);
  }

  return {
    exploitAgentUrl: participants.exploit_agent,
    difficulty,
    spec: {
      projectName: config.project_name,
      vulnerabilityType,
      network,
      lossAmountUsd: config.loss_amount_usd,
      blockNumber: config.block_number,
      date,
      contractPath: config.contract_path,
      testCommand: config.test_command,
      referenceLinks: config.reference_links,
      vulnerabilityId: config.vulnerability_id,
      attackerAddress: config.attacker_address,
      vulnerableContract: config.vulnerable_contract,
      transactionHash: config.transaction_hash,
    },
  };
}

export function parseAssessmentRequestText(text: string): { request: AssessmentRequest; payload: unknown } {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    throw new InvalidSpecError(["Request must be a JSON object with participants and config"]);
  }

  return { request: parseAssessmentRequest(payload), payload };
}
