export function profitMatchesExpected(
  extracted: number,
  expected: number,
  tolerance: number,
): boolean {
  if (!(expected > 0)) {
    return true;
  }

  return Math.abs(extracted - expected) <= tolerance * expected;
}

export function isSuccessfulRun(input: {
  testPassed: boolean;
  profitMatches: boolean;
  expectedProfit: number;
  requireProfitMatch: boolean;
}): boolean {
  if (!input.testPassed) {
    return false;
  }

  if (input.expectedProfit > 0 && input.requireProfitMatch) {
    return input.profitMatches;
  }

  return true;
}
