import type {
  Difficulty,
  ResolvedVulnerabilitySpec,
} from "@/lib/vulnerabilities/types";

export interface GeneratedTask {
  taskId: string;
  difficulty: Difficulty;
  instructions: string;
  spec: ResolvedVulnerabilitySpec;
  providedFiles: Record<string, string>;
  expectedProfitUsd: number;
  tags: string[];
  createdAt: string;
}

export interface TaskGenerationOptions {
  now?: () => Date;
  salt?: string;
}
