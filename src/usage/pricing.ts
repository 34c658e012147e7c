export interface ModelPrice {
  /** USD per million input tokens. */
  input: number;
  /** USD per million output tokens. */
  output: number;
}

export const DEFAULT_PRICED_MODEL = "claude-sonnet-4-20250514";

export const PRICING: Record<string, ModelPrice> = {
  "claude-sonnet-4-20250514": { input: 3, output: 15 },
  "claude-sonnet-4-5-20250929": { input: 3, output: 15 },
  "claude-opus-4-5-20251101": { input: 15, output: 75 },
  "claude-3-5-haiku-20241022": { input: 0.8, output: 4 },
  "claude-3-haiku-20240307": { input: 0.25, output: 1.25 },
};

const round6 = (value: number): number => Math.round(value * 1_000_000) / 1_000_000;

export interface Cost {
  inputCost: number;
  outputCost: number;
  totalCost: number;
}

/** Unknown models are priced as the default model. */
export const calculateCost = (model: string, inputTokens: number, outputTokens: number): Cost => {
  const price = PRICING[model] ?? PRICING[DEFAULT_PRICED_MODEL];
  const inputCost = (inputTokens / 1_000_000) * price.input;
  const outputCost = (outputTokens / 1_000_000) * price.output;
  return {
    inputCost: round6(inputCost),
    outputCost: round6(outputCost),
    totalCost: round6(inputCost + outputCost),
  };
};
