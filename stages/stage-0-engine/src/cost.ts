import type { CostEstimate, CostTable, Usage } from "./types.js";

export function estimateCost(
  usage: Usage | undefined,
  model: string | undefined,
  costTable: CostTable
): CostEstimate | undefined {
  if (!usage || !model) {
    return undefined;
  }

  const entry = costTable[model];
  if (!entry) {
    return undefined;
  }

  const rawInput = (usage.inputTokens / 1000) * entry.inputCentsPer1k;
  const rawOutput = (usage.outputTokens / 1000) * entry.outputCentsPer1k;
  const round4 = (x: number) => Math.round(x * 10000) / 10000;
  const inputCents = round4(rawInput);
  const outputCents = round4(rawOutput);
  const totalCents = round4(inputCents + outputCents);

  return {
    inputCents,
    outputCents,
    totalCents,
    currency: entry.currency ?? "USD",
  };
}

export function createDefaultCostTable(): CostTable {
  return {
    "gpt-4o": { inputCentsPer1k: 0.25, outputCentsPer1k: 1.0 },
    "gpt-4o-mini": { inputCentsPer1k: 0.015, outputCentsPer1k: 0.06 },
    "gpt-4.1": { inputCentsPer1k: 0.2, outputCentsPer1k: 0.8 },
    "gpt-4.1-mini": { inputCentsPer1k: 0.04, outputCentsPer1k: 0.16 },
    "text-embedding-3-small": { inputCentsPer1k: 0.002, outputCentsPer1k: 0 },
    "text-embedding-3-large": { inputCentsPer1k: 0.013, outputCentsPer1k: 0 },
  };
}
