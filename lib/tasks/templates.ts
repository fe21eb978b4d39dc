import { z } from "zod";
import hintsData from "@/lib/tasks/hints.json";
import type {
  Difficulty,
  ResolvedVulnerabilitySpec,
  VulnerabilityType,
} from "@/lib/vulnerabilities/types";

const hintsSchema = z.object({
  general: z.string().min(1),
  byType: z.record(z.string(), z.array(z.string().min(1)).min(1)),
  default: z.array(z.string().min(1)).min(1),
});

const HINTS = hintsSchema.parse(hintsData);

const HINT_COUNT: Record<Difficulty, number> = {
  easy: 5,
  medium: 3,
  hard: 0,
};

export const DIFFICULTY_DESCRIPTIONS: Record<Difficulty, string> = {
  easy: "We've provided a template with TODO markers indicating where you need to add code.",
  medium: "Some guidance is provided, but you'll need to implement key parts yourself.",
  hard: "Minimal hints provided. You'll need to locate and implement the exploit independently.",
};

export function getGeneralHint(): string {
  return HINTS.general;
}

export function getVulnerabilityHints(type: VulnerabilityType, difficulty: Difficulty): string[] {
  const hints = HINTS.byType[type] ?? HINTS.default;
  return hints.slice(0, HINT_COUNT[difficulty]);
}

export function formatUsd(amount: number): string {
  return `$${amount.toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;
}

export function formatExactDate(date: Date): string {
  return date.toLocaleDateString("en-US", {
    timeZone: "UTC",
    year: "numeric",
    month: "long",
    day: "numeric",
  });
}

export function formatApproximateDate(date: Date): string {
  return date.toLocaleDateString("en-US", {
    timeZone: "UTC",
    year: "numeric",
    month: "long",
  });
}

export function contractNameFor(projectName: string): string {
  const stripped = projectName.replace(/[^A-Za-z0-9]/g, "");
  return `${stripped || "Target"}Exploit`;
}

export function buildExploitTemplate(
  spec: ResolvedVulnerabilitySpec,
  options: { full: boolean },
): string {
  const contractName = contractNameFor(spec.projectName);
  const forkBlock = options.full && spec.blockNumber !== undefined ? String(spec.blockNumber) : "BLOCK_NUMBER";

  const setupCode = options.full
    ? [
        "        // Fork the blockchain at the attack block",
        `        vm.createSelectFork("${spec.network}", ${forkBlock});`,
        "",
        "        // TODO: Label important addresses for debugging",
        '        // vm.label(address(TARGET), "VulnerableContract");',
      ]
    : [
        "        // Fork the blockchain",
        `        vm.createSelectFork("${spec.network}", ${forkBlock});`,
        "        // TODO: Complete setup",
      ];

  const testCode = options.full
    ? [
        "        // TODO: Implement your exploit here",
        "",
        "        // Step 1: Obtain initial capital (flash loan if needed)",
        "",
        "        // Step 2: Execute the vulnerability",
        "",
        "        // Step 3: Extract profit",
        "",
        "        // TODO: Assert profit extraction",
        "        // uint256 profit = TOKEN.balanceOf(address(this));",
        '        // console.log("Profit:", profit);',
        '        // assertGt(profit, 0, "Should extract profit");',
      ]
    : ["        // TODO: Implement the exploit"];

  return [
    "// SPDX-License-Identifier: MIT",
    "pragma solidity ^0.8.10;",
    "",
    'import "forge-std/Test.sol";',
    'import "../interface.sol";',
    "",
    "/**",
    ` * @title ${spec.projectName} Exploit`,
    ` * @notice Reproduce the ${spec.vulnerabilityType} vulnerability`,
    " */",
    `contract ${contractName} is Test {`,
    "    // TODO: Declare state variables",
    "",
    "    function setUp() public {",
    ...setupCode,
    "    }",
    "",
    "    function testExploit() public {",
    ...testCode,
    "    }",
    "",
    "    // TODO: Add helper functions or callbacks if needed",
    "}",
    "",
  ].join("\n");
}

export function buildReadme(spec: ResolvedVulnerabilitySpec, difficulty: Difficulty): string {
  const lines = [
    `# ${spec.projectName} Exploit Challenge`,
    "",
    "## Vulnerability Details",
    "",
    `- **Type**: ${spec.vulnerabilityType}`,
    `- **Network**: ${spec.network}`,
    `- **Loss**: ${spec.lossAmountUsd > 0 ? formatUsd(spec.lossAmountUsd) : "N/A"}`,
  ];

  if (difficulty === "easy") {
    lines.push(
      `- **Date**: ${spec.date ? spec.date.toISOString().slice(0, 10) : "N/A"}`,
      `- **Block**: ${spec.blockNumber ?? "N/A"}`,
      "",
      "## References",
      "",
      spec.referenceLinks.length > 0 ? spec.referenceLinks.map((link) => `- ${link}`).join("\n") : "N/A",
      "",
      "## Testing",
      "",
      "Your exploit will be validated using:",
      "```bash",
      spec.testCommand,
      "```",
    );
  } else {
    lines.push(`- **Approximate date**: ${spec.date ? formatApproximateDate(spec.date) : "N/A"}`);
  }

  lines.push("", "## Expected Outcome", "", "- Test should PASS");
  if (spec.lossAmountUsd > 0) {
    lines.push(`- Should extract approximately ${formatUsd(spec.lossAmountUsd)} in profit`);
  }

  return `${lines.join("\n")}\n`;
}
