import { execa } from "execa";
import type { CommandInvocation, CommandOutcome, CommandRunner } from "@/lib/validation/types";

const FORCE_KILL_AFTER_MS = 5_000;

export function tokenizeCommand(command: string): string[] {
  const tokens: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;

  for (const match of command.matchAll(pattern)) {
    tokens.push(match[1] ?? match[2] ?? match[3] ?? "");
  }

  return tokens;
}

function spawnErrorMessage(result: object): string {
  if ("shortMessage" in result && typeof result.shortMessage === "string") {
    return result.shortMessage;
  }

  if ("message" in result && typeof result.message === "string") {
    return result.message;
  }

  return "Failed to start process";
}

export const runCommand: CommandRunner = async (
  invocation: CommandInvocation,
): Promise<CommandOutcome> => {
  const result = await execa(invocation.file, invocation.args, {
    cwd: invocation.cwd,
    env: invocation.env,
    extendEnv: true,
    all: true,
    reject: false,
    timeout: invocation.timeoutMs,
    forceKillAfterDelay: FORCE_KILL_AFTER_MS,
  });

  const exitCode = typeof result.exitCode === "number" ? result.exitCode : null;
  const output = result.all ?? `${result.stdout}\n${result.stderr}`;

  if (result.timedOut) {
    return { exitCode, output, timedOut: true, spawnError: null };
  }

  if (result.failed && exitCode === null && !result.isTerminated) {
    return { exitCode, output, timedOut: false, spawnError: spawnErrorMessage(result) };
  }

  return { exitCode, output, timedOut: false, spawnError: null };
};
