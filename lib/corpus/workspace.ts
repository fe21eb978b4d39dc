import { copyFile, mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { SubmissionError } from "@/lib/errors";

export interface StagedSubmission {
  targetPath: string;
  backupPath: string | null;
  restore: () => Promise<void>;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export function resolveCorpusPath(corpusRepoPath: string, relativePath: string): string {
  const root = path.resolve(corpusRepoPath);
  const target = path.resolve(root, relativePath.replace(/^\.\//, ""));

  if (target !== root && !target.startsWith(`${root}${path.sep}`)) {
    throw new SubmissionError(`Contract path escapes the corpus checkout: ${relativePath}`);
  }

  return target;
}

export async function stageSubmission(
  corpusRepoPath: string,
  contractPath: string,
  exploitCode: string,
): Promise<StagedSubmission> {
  const targetPath = resolveCorpusPath(corpusRepoPath, contractPath);
  await mkdir(path.dirname(targetPath), { recursive: true });

  let backupPath: string | null = null;
  if (await exists(targetPath)) {
    backupPath = `${targetPath}.backup`;
    await copyFile(targetPath, backupPath);
  }

  await writeFile(targetPath, exploitCode, "utf8");

  return {
    targetPath,
    backupPath,
    async restore() {
      if (backupPath) {
        await rename(backupPath, targetPath);
        return;
      }

      await rm(targetPath, { force: true });
    },
  };
}
