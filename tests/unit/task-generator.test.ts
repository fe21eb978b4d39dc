import { describe, expect, it } from "vitest";
import { InvalidSpecError } from "@/lib/errors";
import { buildTaskMessage } from "@/lib/agents/task-message";
import { deriveContractPath, generateTask, slugifyProjectName } from "@/lib/tasks/generator";
import {
  FIXED_NOW,
  FIXED_SALT,
  SAMPLE_CONTRACT_PATH,
  SAMPLE_TEST_COMMAND,
  sampleSpec,
  taskOptions,
} from "@/tests/helpers/fixtures";

function numberedLines(text: string): number {
  return text.match(/^\d+\. /gm)?.length ?? 0;
}

describe("generateTask", () => {
  it("builds an easy task for a known incident", () => {
    const task = generateTask(sampleSpec(), "easy", taskOptions());

    expect(task.taskId).toMatch(/^sampleprotocol_20240301_[0-9a-f]{8}_easy$/);
    expect(task.instructions).toContain("reentrancy");
    expect(task.instructions).toContain("$150,000.00");
    expect(task.instructions).toContain("On January 15, 2024, the SampleProtocol protocol was exploited");
    expect(task.instructions).toContain(`Contract Path: \`${SAMPLE_CONTRACT_PATH}\``);
    expect(task.instructions).toContain(SAMPLE_TEST_COMMAND);
    expect(task.instructions).toContain("- Block Number: 19000000");
    expect(task.instructions).toContain("- Reference: https://example.com/postmortem");
    expect(task.expectedProfitUsd).toBe(150_000);
    expect(task.tags).toEqual(["easy", "reentrancy", "mainnet"]);
    expect(task.createdAt).toBe(FIXED_NOW.toISOString());
    expect(task.spec.contractPath).toBe(SAMPLE_CONTRACT_PATH);
    expect(task.spec.testCommand).toBe(SAMPLE_TEST_COMMAND);
  });

  it("is deterministic for a fixed clock and salt", () => {
    const first = generateTask(sampleSpec(), "medium", taskOptions());
    const second = generateTask(sampleSpec(), "medium", taskOptions());

    expect(second).toEqual(first);
  });

  it("varies the task id hash with the salt", () => {
    const first = generateTask(sampleSpec(), "easy", taskOptions());
    const second = generateTask(sampleSpec(), "easy", { now: () => FIXED_NOW, salt: `${FIXED_SALT}x` });

    expect(second.taskId).not.toBe(first.taskId);
    expect(second.taskId.startsWith("sampleprotocol_20240301_")).toBe(true);
  });

  it("reveals less at each harder difficulty", () => {
    const easy = generateTask(sampleSpec(), "easy", taskOptions());
    const medium = generateTask(sampleSpec(), "medium", taskOptions());
    const hard = generateTask(sampleSpec(), "hard", taskOptions());

    expect(numberedLines(easy.instructions)).toBe(6);
    expect(numberedLines(medium.instructions)).toBe(4);
    expect(numberedLines(hard.instructions)).toBe(1);

    expect(medium.instructions).toContain("reentrancy");
    expect(medium.instructions).toContain("- Approximate Date: January 2024");
    expect(medium.instructions).not.toContain("January 15, 2024");
    expect(medium.instructions).not.toContain(SAMPLE_CONTRACT_PATH);
    expect(medium.instructions).not.toContain("Block Number");

    expect(hard.instructions).not.toContain("reentrancy");
    expect(hard.instructions).not.toContain("2024");
    expect(hard.instructions).not.toContain(SAMPLE_CONTRACT_PATH);
    expect(hard.instructions).toContain("$150,000.00");
  });

  it("provides starter files only below hard difficulty", () => {
    const easy = generateTask(sampleSpec(), "easy", taskOptions());
    const medium = generateTask(sampleSpec(), "medium", taskOptions());
    const hard = generateTask(sampleSpec(), "hard", taskOptions());

    expect(Object.keys(easy.providedFiles).sort()).toEqual(["README.md", "exploit_template.sol"]);
    expect(easy.providedFiles["exploit_template.sol"]).toContain('vm.createSelectFork("mainnet", 19000000);');
    expect(easy.providedFiles["exploit_template.sol"]).toContain("contract SampleProtocolExploit is Test {");
    expect(easy.providedFiles["README.md"]).toContain("- **Date**: 2024-01-15");

    expect(medium.providedFiles["exploit_template.sol"]).toContain('vm.createSelectFork("mainnet", BLOCK_NUMBER);');
    expect(medium.providedFiles["README.md"]).toContain("- **Approximate date**: January 2024");

    expect(hard.providedFiles).toEqual({});
  });

  it("falls back to the clock when the incident date is unknown", () => {
    const task = generateTask(sampleSpec({ date: undefined }), "hard", taskOptions());

    expect(task.taskId).toMatch(/^sampleprotocol_20240301_[0-9a-f]{8}_hard$/);
    expect(task.spec.contractPath).toBe("mainnet/2024-03/SampleProtocol_exp.sol");
  });

  it("keeps an explicit contract path and derives the test command from it", () => {
    const task = generateTask(
      sampleSpec({ contractPath: "src/test/2024-01/Custom_exp.sol" }),
      "easy",
      taskOptions(),
    );

    expect(task.spec.testCommand).toBe("forge test --contracts ./src/test/2024-01/Custom_exp.sol -vvv");
  });

  it("omits the profit target when the loss is unknown", () => {
    const task = generateTask(sampleSpec({ lossAmountUsd: 0 }), "easy", taskOptions());

    expect(task.expectedProfitUsd).toBe(0);
    expect(task.instructions).toContain("an undisclosed amount of assets");
    expect(task.instructions).not.toContain("in profit");
  });

  it("rejects specs without a project name or with a negative loss", () => {
    expect(() => generateTask(sampleSpec({ projectName: "   ", lossAmountUsd: -5 }), "easy")).toThrowError(
      new InvalidSpecError(["project_name is required", "loss_amount_usd must be a non-negative number"]),
    );
  });

  it("rejects unknown vulnerability types, networks and difficulties", () => {
    const spec = { ...sampleSpec(), vulnerabilityType: "time_travel", network: "moonbase" };

    let caught: unknown;
    try {
      generateTask(spec, "legendary", taskOptions());
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidSpecError);
    const issues = caught instanceof InvalidSpecError ? caught.issues : [];
    expect(issues).toHaveLength(3);
    expect(issues[0]?.startsWith("Invalid vulnerability_type: time_travel. Must be one of: reentrancy,")).toBe(true);
    expect(issues[1]?.startsWith("Invalid network: moonbase. Must be one of: mainnet,")).toBe(true);
    expect(issues[2]).toBe("Invalid difficulty: legendary. Must be one of: easy, medium, hard");
  });
});

describe("task messages", () => {
  it("keep the exact incident day out of medium and hard tasks", () => {
    for (const difficulty of ["medium", "hard"] as const) {
      const message = buildTaskMessage(generateTask(sampleSpec(), difficulty, taskOptions()));

      expect(message).toContain("Task ID: sampleprotocol_20240301_");
      expect(message).not.toContain("20240115");
      expect(message).not.toContain("2024-01-15");
      expect(message).not.toContain("January 15");
    }
  });

  it("state the exact incident day in easy tasks", () => {
    const message = buildTaskMessage(generateTask(sampleSpec(), "easy", taskOptions()));

    expect(message).toContain("On January 15, 2024, the SampleProtocol protocol was exploited");
  });
});

describe("task naming helpers", () => {
  it("slugifies project names", () => {
    expect(slugifyProjectName("Euler Finance (v2)")).toBe("euler_finance_v2");
    expect(slugifyProjectName("***")).toBe("project");
  });

  it("derives corpus contract paths from network and month", () => {
    expect(deriveContractPath(sampleSpec({ network: "bsc" }), new Date("2023-11-02T00:00:00Z"))).toBe(
      "bsc/2023-11/SampleProtocol_exp.sol",
    );
  });
});
