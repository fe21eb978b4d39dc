import { ParseError } from "@/lib/errors";
import { createLogger } from "@/lib/logging/logger";
import {
  DEFAULT_PARSE_POLICY,
  type OutputParsePolicy,
  type ParsedTestOutput,
} from "@/lib/validation/types";

const logger = createLogger("output-parser");

const GAS_PATTERNS = [/\(gas:\s*(\d+)\)/i, /gas:\s*(\d+)/i, /gas used:\s*(\d+)/i];

const REVERT_PATTERNS = [/reverted with:\s*(.+)/, /Revert.*?:\s*(.+)/, /Error:\s*(.+)/];

function includesAny(text: string, markers: string[]): boolean {
  return markers.some((marker) => marker.length > 0 && text.includes(marker));
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source, "i");
  } catch (error) {
    throw new ParseError(
      `Invalid profit pattern ${JSON.stringify(source)}: ${error instanceof Error ? error.message : "unknown"}`,
    );
  }
}

export function extractProfit(raw: string, patterns: string[]): number {
  for (const source of patterns) {
    const match = raw.match(compilePattern(source));
    const captured = match?.[1];
    if (captured === undefined) {
      continue;
    }

    const value = Number(captured.replace(/,/g, ""));
    if (!Number.isFinite(value)) {
      throw new ParseError(`Unparseable profit figure: ${captured}`);
    }

    return value;
  }

  return 0;
}

function extractGasUsed(raw: string): number | null {
  for (const pattern of GAS_PATTERNS) {
    const match = raw.match(pattern);
    if (match?.[1]) {
      return Number.parseInt(match[1], 10);
    }
  }

  return null;
}

function extractRevertMessage(raw: string): string | null {
  for (const pattern of REVERT_PATTERNS) {
    const match = raw.match(pattern);
    if (match?.[1]) {
      return match[1].trim();
    }
  }

  return null;
}

function extractEvents(raw: string): Array<{ name: string; params: string }> {
  return [...raw.matchAll(/emit\s+(\w+)\((.*?)\)/g)].map((match) => ({
    name: match[1] ?? "",
    params: match[2] ?? "",
  }));
}

export function parseTestOutput(
  raw: string,
  policy: OutputParsePolicy = DEFAULT_PARSE_POLICY,
): ParsedTestOutput {
  const passed = includesAny(raw, policy.passMarkers) && !includesAny(raw, policy.failMarkers);

  let profit = 0;
  try {
    profit = extractProfit(raw, policy.profitPatterns);
  } catch (error) {
    if (!(error instanceof ParseError)) {
      throw error;
    }
    logger.debug("Profit extraction failed; defaulting to zero", { reason: error.message });
  }

  return {
    passed,
    sawTestResults: includesAny(raw, policy.resultMarkers),
    profit,
    gasUsed: extractGasUsed(raw),
    revertMessage: passed ? null : extractRevertMessage(raw),
    events: extractEvents(raw),
  };
}
