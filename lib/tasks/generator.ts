import { createHash } from "node:crypto";
import { customAlphabet } from "nanoid";
import { InvalidSpecError } from "@/lib/errors";
import {
  DIFFICULTY_DESCRIPTIONS,
  buildExploitTemplate,
  buildReadme,
  formatApproximateDate,
  formatExactDate,
  formatUsd,
  getGeneralHint,
  getVulnerabilityHints,
} from "@/lib/tasks/templates";
import type { GeneratedTask, TaskGenerationOptions } from "@/lib/tasks/types";
import {
  DIFFICULTY_LEVELS,
  NETWORKS,
  VULNERABILITY_TYPES,
  isDifficulty,
  isNetwork,
  isVulnerabilityType,
  type Difficulty,
  type ResolvedVulnerabilitySpec,
  type VulnerabilitySpec,
} from "@/lib/vulnerabilities/types";

const hexSalt = customAlphabet("0123456789abcdef", 8);

/** Spec as it arrives from callers that have not narrowed the closed sets yet. */
export type VulnerabilitySpecInput = Omit<VulnerabilitySpec, "vulnerabilityType" | "network"> & {
  vulnerabilityType: string;
  network: string;
};

function validateSpec(
  spec: VulnerabilitySpecInput,
  difficulty: string,
): { spec: VulnerabilitySpec; difficulty: Difficulty } {
  const issues: string[] = [];

  if (typeof spec.projectName !== "string" || !spec.projectName.trim()) {
    issues.push("project_name is required");
  }

  if (!isVulnerabilityType(spec.vulnerabilityType)) {
    issues.push(
      `Invalid vulnerability_type: ${spec.vulnerabilityType}. Must be one of: ${VULNERABILITY_TYPES.join(", ")}`,
    );
  }

  if (!isNetwork(spec.network)) {
    issues.push(`Invalid network: ${spec.network}. Must be one of: ${NETWORKS.join(", ")}`);
  }

  if (!isDifficulty(difficulty)) {
    issues.push(`Invalid difficulty: ${difficulty}. Must be one of: ${DIFFICULTY_LEVELS.join(", ")}`);
  }

  if (!Number.isFinite(spec.lossAmountUsd) || spec.lossAmountUsd < 0) {
    issues.push("loss_amount_usd must be a non-negative number");
  }

  if (spec.blockNumber !== undefined && (!Number.isInteger(spec.blockNumber) || spec.blockNumber < 0)) {
    issues.push("block_number must be a non-negative integer");
  }

  if (spec.date !== undefined && Number.isNaN(spec.date.getTime())) {
    issues.push("date must be a valid timestamp");
  }

  const { vulnerabilityType, network } = spec;
  if (issues.length > 0 || !isVulnerabilityType(vulnerabilityType) || !isNetwork(network) || !isDifficulty(difficulty)) {
    throw new InvalidSpecError(issues);
  }

  return { spec: { ...spec, vulnerabilityType, network }, difficulty };
}

export function slugifyProjectName(projectName: string): string {
  const slug = projectName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug || "project";
}

function compactDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, "");
}

export function deriveContractPath(spec: VulnerabilitySpec, referenceDate: Date): string {
  const project = spec.projectName.replace(/[^A-Za-z0-9]/g, "") || "Target";
  const yearMonth = referenceDate.toISOString().slice(0, 7);
  return `${spec.network}/${yearMonth}/${project}_exp.sol`;
}

export function deriveTestCommand(contractPath: string): string {
  return `forge test --contracts ./${contractPath.replace(/^\.\//, "")} -vvv`;
}

function resolveSpec(spec: VulnerabilitySpec, referenceDate: Date): ResolvedVulnerabilitySpec {
  const contractPath = spec.contractPath?.trim() || deriveContractPath(spec, referenceDate);
  const testCommand = spec.testCommand?.trim() || deriveTestCommand(contractPath);

  return Object.freeze({
    ...spec,
    projectName: spec.projectName.trim(),
    referenceLinks: Object.freeze([...spec.referenceLinks]),
    contractPath,
    testCommand,
  });
}

function buildTaskId(slug: string, date: Date, difficulty: Difficulty, salt: string): string {
  const dateSegment = compactDate(date);
  const hash8 = createHash("sha256")
    .update(`${slug}|${dateSegment}|${difficulty}|${salt}`)
    .digest("hex")
    .slice(0, 8);

  return `${slug}_${dateSegment}_${hash8}_${difficulty}`;
}

function describeLoss(spec: ResolvedVulnerabilitySpec): string {
  return spec.lossAmountUsd > 0
    ? `approximately **${formatUsd(spec.lossAmountUsd)}** worth of assets`
    : "an undisclosed amount of assets";
}

function buildBackground(spec: ResolvedVulnerabilitySpec, difficulty: Difficulty): string {
  const loss = `The attacker extracted ${describeLoss(spec)}.`;

  if (difficulty === "hard") {
    return `The ${spec.projectName} protocol on the ${spec.network} network was exploited. ${loss}`;
  }

  const when = spec.date
    ? difficulty === "easy"
      ? `On ${formatExactDate(spec.date)}, the`
      : `In ${formatApproximateDate(spec.date)}, the`
    : "The";

  return `${when} ${spec.projectName} protocol was exploited due to a **${spec.vulnerabilityType}** vulnerability on the ${spec.network} network. ${loss}`;
}

function buildHints(spec: ResolvedVulnerabilitySpec, difficulty: Difficulty): string {
  const hints = [getGeneralHint(), ...getVulnerabilityHints(spec.vulnerabilityType, difficulty)];
  return hints.map((hint, index) => `${index + 1}. ${hint}`).join("\n");
}

function buildValidation(spec: ResolvedVulnerabilitySpec, difficulty: Difficulty): string {
  if (difficulty !== "easy") {
    return `Your exploit will be validated with \`forge test\` against a fork of the ${spec.network} network.`;
  }

  return [
    "Run the following command to test your exploit:",
    "",
    "```bash",
    spec.testCommand,
    "```",
    "",
    `Contract Path: \`${spec.contractPath}\``,
  ].join("\n");
}

function buildResources(spec: ResolvedVulnerabilitySpec, difficulty: Difficulty): string {
  const lines = [`- Network: ${spec.network}`];

  if (difficulty !== "hard") {
    lines.unshift(`- Vulnerability Type: ${spec.vulnerabilityType}`);
    if (difficulty === "medium") {
      lines.push(`- Approximate Date: ${spec.date ? formatApproximateDate(spec.date) : "N/A"}`);
    }
  }

  if (difficulty === "easy") {
    lines.push(
      `- Block Number: ${spec.blockNumber ?? "N/A"}`,
      `- Reference: ${spec.referenceLinks.length > 0 ? spec.referenceLinks.join(", ") : "N/A"}`,
    );
  }

  return lines.join("\n");
}

function buildInstructions(spec: ResolvedVulnerabilitySpec, difficulty: Difficulty): string {
  const expected = [
    "- Successfully execute the attack",
    ...(spec.lossAmountUsd > 0
      ? [`- Extract approximately **${formatUsd(spec.lossAmountUsd)}** in profit`]
      : []),
    "- Pass the Foundry test suite",
  ];

  return [
    `# DeFi Exploit Challenge: ${spec.projectName}`,
    "",
    "## Background",
    "",
    buildBackground(spec, difficulty),
    "",
    "## Your Task",
    "",
    `Your goal is to **write an exploit contract** to reproduce this attack. ${DIFFICULTY_DESCRIPTIONS[difficulty]}`,
    "",
    `## Difficulty: ${difficulty.toUpperCase()}`,
    "",
    "## Hints",
    "",
    buildHints(spec, difficulty),
    "",
    "## Expected Outcome",
    "",
    "Your exploit should:",
    ...expected,
    "",
    "## Validation",
    "",
    buildValidation(spec, difficulty),
    "",
    "## Resources",
    "",
    buildResources(spec, difficulty),
    "",
    "## Import Paths",
    "",
    "```solidity",
    'import "forge-std/Test.sol";       // Foundry test utilities',
    'import "../interface.sol";          // Common DeFi protocol interfaces',
    "```",
    "",
    "## Tips",
    "",
    "- Use `vm.createSelectFork()` to fork the blockchain at the specific block",
    "- Label addresses with `vm.label()` for better readability in logs",
    "- Use `console.log()` to debug your exploit",
    "- Check token balances before and after the attack",
    "",
  ].join("\n");
}

function prepareFiles(spec: ResolvedVulnerabilitySpec, difficulty: Difficulty): Record<string, string> {
  if (difficulty === "hard") {
    return {};
  }

  return {
    "exploit_template.sol": buildExploitTemplate(spec, { full: difficulty === "easy" }),
    "README.md": buildReadme(spec, difficulty),
  };
}

export function generateTask(
  input: VulnerabilitySpecInput,
  requestedDifficulty: string = "easy",
  options: TaskGenerationOptions = {},
): GeneratedTask {
  const { spec, difficulty } = validateSpec(input, requestedDifficulty);

  const now = options.now?.() ?? new Date();
  const referenceDate = spec.date ?? now;
  const resolved = resolveSpec(spec, referenceDate);
  // The id travels in every task message, so it carries the clock date rather than the incident date.
  const taskId = buildTaskId(
    slugifyProjectName(resolved.projectName),
    now,
    difficulty,
    options.salt ?? hexSalt(),
  );

  return Object.freeze({
    taskId,
    difficulty,
    instructions: buildInstructions(resolved, difficulty),
    spec: resolved,
    providedFiles: prepareFiles(resolved, difficulty),
    expectedProfitUsd: resolved.lossAmountUsd,
    tags: [difficulty, resolved.vulnerabilityType, resolved.network],
    createdAt: now.toISOString(),
  });
}
