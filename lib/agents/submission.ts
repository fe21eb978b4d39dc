const FENCED_BLOCK_PATTERNS = [
  /```solidity\r?\n([\s\S]*?)```/g,
  /```sol\r?\n([\s\S]*?)```/g,
  /```\r?\n([\s\S]*?)```/g,
];

function looksLikeSolidity(code: string): boolean {
  return code.includes("pragma solidity") || code.includes("contract");
}

export function extractExploitCode(response: string): string | null {
  for (const pattern of FENCED_BLOCK_PATTERNS) {
    for (const match of response.matchAll(pattern)) {
      const block = match[1];
      if (block !== undefined && looksLikeSolidity(block)) {
        return block.trim();
      }
    }
  }

  const start = response.indexOf("pragma solidity");
  if (start >= 0) {
    const end = response.lastIndexOf("}");
    if (end > start) {
      return response.slice(start, end + 1).trim();
    }
  }

  return null;
}
