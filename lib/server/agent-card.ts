import type { AgentCard } from "@/lib/a2a/types";
import type { AssessmentRequestInput } from "@/lib/assessments/request";

const PROTOCOL_VERSION = "0.3.0";
const VERSION = "1.0.0";

export const EXAMPLE_ASSESSMENT_REQUEST = {
  participants: {
    exploit_agent: "http://127.0.0.1:9010/",
  },
  config: {
    project_name: "SampleProtocol",
    vulnerability_type: "reentrancy",
    network: "mainnet",
    difficulty: "easy",
    loss_amount_usd: 150000,
    block_number: 19000000,
    date: "2024-01-15",
    reference_links: ["https://example.com/postmortem"],
  },
} satisfies AssessmentRequestInput;

export function buildAssessorCard(url: string): AgentCard {
  return {
    name: "ForkBench Assessor",
    description:
      "Generates DeFi exploit reproduction tasks, sends them to an exploit agent and validates the returned " +
      "Solidity exploit by running it against forked chain state.",
    url,
    version: VERSION,
    protocolVersion: PROTOCOL_VERSION,
    defaultInputModes: ["text"],
    defaultOutputModes: ["text"],
    capabilities: { streaming: false },
    skills: [
      {
        id: "defi_exploit_assessment",
        name: "DeFi exploit assessment",
        description:
          "Assess an exploit agent on a historical incident. Send a JSON message with participants.exploit_agent " +
          "and a config holding project_name, vulnerability_type, network and optional difficulty.",
        tags: ["defi", "security", "benchmark", "foundry"],
        examples: [JSON.stringify(EXAMPLE_ASSESSMENT_REQUEST)],
      },
    ],
  };
}

export function buildGroundtruthCard(url: string): AgentCard {
  return {
    name: "ForkBench Groundtruth Agent",
    description: "Baseline exploit agent that answers with the reference exploit from the corpus checkout.",
    url,
    version: VERSION,
    protocolVersion: PROTOCOL_VERSION,
    defaultInputModes: ["text"],
    defaultOutputModes: ["text"],
    capabilities: { streaming: false },
    skills: [
      {
        id: "reference_exploit",
        name: "Reference exploit",
        description: "Returns the corpus exploit named by the task's contract path.",
        tags: ["defi", "baseline"],
      },
    ],
  };
}
