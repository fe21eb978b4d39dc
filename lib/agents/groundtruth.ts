import { readFile } from "node:fs/promises";
import { resolveCorpusPath } from "@/lib/corpus/workspace";
import { createLogger } from "@/lib/logging/logger";

const logger = createLogger("groundtruth-agent");

const CONTRACT_PATH_PATTERNS = [
  /forge test --contracts\s+(?:\.\/)?(\S+\.sol)/,
  /forge test --match-path\s+(?:\.\/)?(\S+\.sol)/,
  /Contract Path:\s*`?(?:\.\/)?([^\s`]+\.sol)`?/,
  /contract_path["']?\s*[:=]\s*["']?(?:\.\/)?([^\s"']+\.sol)/,
];

export interface GroundtruthAgent {
  respond(taskDescription: string): Promise<string>;
}

export function extractContractPath(taskDescription: string): string | null {
  for (const pattern of CONTRACT_PATH_PATTERNS) {
    const match = taskDescription.match(pattern);
    if (match?.[1]) {
      return match[1];
    }
  }

  return null;
}

function candidatePaths(contractPath: string): string[] {
  return contractPath.startsWith("src/")
    ? [contractPath, contractPath.slice(4)]
    : [contractPath, `src/${contractPath}`];
}

async function readFirstExisting(corpusRepoPath: string, contractPath: string): Promise<string | null> {
  for (const candidate of candidatePaths(contractPath)) {
    try {
      return await readFile(resolveCorpusPath(corpusRepoPath, candidate), "utf8");
    } catch (error) {
      logger.debug("Groundtruth candidate not readable", {
        candidate,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return null;
}

export function buildErrorContract(reason: string): string {
  const comment = reason.replace(/\r?\n/g, " ");
  return [
    `Error: ${reason}`,
    "",
    "```solidity",
    "// SPDX-License-Identifier: UNLICENSED",
    "pragma solidity ^0.8.10;",
    "",
    'import "forge-std/Test.sol";',
    "",
    "contract GroundtruthError is Test {",
    "    function setUp() public {",
    `        // ${comment}`,
    "    }",
    "",
    "    function testExploit() public {",
    '        revert("Groundtruth agent error - see setUp for details");',
    "    }",
    "}",
    "```",
  ].join("\n");
}

export function createGroundtruthAgent(corpusRepoPath: string): GroundtruthAgent {
  return {
    async respond(taskDescription) {
      const contractPath = extractContractPath(taskDescription);
      logger.info("Extracted contract path", { contractPath });

      if (!contractPath) {
        return buildErrorContract("Could not extract contract path from task description");
      }

      const exploitCode = await readFirstExisting(corpusRepoPath, contractPath);
      if (exploitCode === null) {
        return buildErrorContract(`Could not read exploit file: ${contractPath}`);
      }

      return `\`\`\`solidity\n${exploitCode}\n\`\`\``;
    },
  };
}
