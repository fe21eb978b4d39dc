import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { isNetwork, type Network } from "@/lib/vulnerabilities/types";

export function applyRpcEndpoints(
  toml: string,
  endpoints: Partial<Record<Network, string>>,
): { text: string; updated: Network[] } {
  const updated: Network[] = [];
  let inRpcSection = false;

  const lines = toml.split("\n").map((line) => {
    const trimmed = line.trim();

    if (/^\[[^\]]+\]$/.test(trimmed)) {
      inRpcSection = trimmed === "[rpc_endpoints]";
      return line;
    }

    if (!inRpcSection) {
      return line;
    }

    const key = trimmed.match(/^([A-Za-z0-9_-]+)\s*=/)?.[1];
    if (!isNetwork(key)) {
      return line;
    }

    const url = endpoints[key];
    if (!url) {
      return line;
    }

    updated.push(key);
    return `${key} = "${url}"`;
  });

  return { text: lines.join("\n"), updated };
}

export async function configureCorpusRpcEndpoints(
  corpusRepoPath: string,
  endpoints: Partial<Record<Network, string>>,
): Promise<Network[]> {
  const foundryToml = path.join(corpusRepoPath, "foundry.toml");
  const original = await readFile(foundryToml, "utf8");
  const { text, updated } = applyRpcEndpoints(original, endpoints);

  if (updated.length > 0) {
    await writeFile(foundryToml, text, "utf8");
  }

  return updated;
}
