/**
 * Per-token model pricing used to estimate LLM call cost (USD).
 * Matching is longest-prefix-first so "gemini-2.5-flash-lite" matches before "gemini-2.5-flash".
 */

export interface ModelPricing {
  readonly inputPerToken: number;
  readonly outputPerToken: number;
}

export type PricingTable = readonly (readonly [prefix: string, pricing: ModelPricing])[];

function perMillion(input: number, output: number): ModelPricing {
  return { inputPerToken: input / 1_000_000, outputPerToken: output / 1_000_000 };
}

export const DEFAULT_PRICING: PricingTable = [
  ['gemini-3-pro', perMillion(2, 12)],
  ['gemini-2.5-pro', perMillion(1.25, 10)],
  ['gemini-2.5-flash-lite', perMillion(0.10, 0.40)],
  ['gemini-2.5-flash', perMillion(0.30, 2.50)],
  ['gemini-2.0-flash', perMillion(0.10, 0.40)],
  ['gpt-4o-mini', perMillion(0.15, 0.60)],
  ['gpt-4o', perMillion(2.50, 10)],
  ['claude-sonnet-4', perMillion(3, 15)],
  ['claude-haiku-4', perMillion(1, 5)]
];

export function lookupModelPricing(model: string, table: PricingTable = DEFAULT_PRICING): ModelPricing | undefined {
  const normalized = model.toLowerCase();
  const sorted = [...table].sort((a, b) => b[0].length - a[0].length);
  for (const [prefix, pricing] of sorted) {
    if (normalized.startsWith(prefix)) {
      return pricing;
    }
  }
  return undefined;
}

/**
 * Returns 0 for unknown models.
 */
export function estimateCostUsd(
  usage: { model?: string; promptTokens: number; completionTokens: number },
  table: PricingTable = DEFAULT_PRICING
): number {
  if (usage.model === undefined) {
    return 0;
  }

  const pricing = lookupModelPricing(usage.model, table);
  if (pricing === undefined) {
    return 0;
  }

  const cost =
    Math.max(0, usage.promptTokens) * pricing.inputPerToken +
    Math.max(0, usage.completionTokens) * pricing.outputPerToken;

  return Number(cost.toFixed(6));
}
