/** USD per million tokens. */
export interface ModelPricing {
  readonly input: number;
  readonly output: number;
  readonly cacheCreate: number;
  readonly cacheRead: number;
}

export type Tier = "Opus" | "Sonnet" | "Haiku";

export const TIER_PRICING: Readonly<Record<Tier, ModelPricing>> = Object.freeze({
  Opus: Object.freeze({ input: 15.0, output: 75.0, cacheCreate: 18.75, cacheRead: 1.5 }),
  Sonnet: Object.freeze({ input: 3.0, output: 15.0, cacheCreate: 3.75, cacheRead: 0.3 }),
  Haiku: Object.freeze({ input: 0.25, output: 1.25, cacheCreate: 0.3, cacheRead: 0.03 }),
});

const KNOWN_MODELS: ReadonlyArray<readonly [string, Tier]> = [
  ["claude-opus-4-5-20251101", "Opus"],
  ["claude-3-opus-20240229", "Opus"],
  ["claude-sonnet-4-5-20250929", "Sonnet"],
  ["claude-3-5-sonnet-20241022", "Sonnet"],
  ["claude-3-5-sonnet-20240620", "Sonnet"],
  ["claude-3-sonnet-20240229", "Sonnet"],
  ["claude-3-5-haiku-20241022", "Haiku"],
  ["claude-3-haiku-20240307", "Haiku"],
];

export const MODEL_PRICING: ReadonlyMap<string, ModelPricing> = new Map(
  KNOWN_MODELS.map(([model, tier]) => [model, TIER_PRICING[tier]] as const),
);
