export type Pricing = {
  input: number; // USD per 1K input tokens
  output: number; // USD per 1K output tokens
};

const DEFAULT_PRICING: Pricing = { input: 0.01, output: 0.03 };

const MODEL_PRICING: Readonly<Record<string, Pricing>> = {
  'gpt-5': { input: 0.00125, output: 0.01 },
  'gpt-5-mini': { input: 0.00025, output: 0.002 },
  'gpt-4.1': { input: 0.002, output: 0.008 },
  'gpt-4.1-mini': { input: 0.0004, output: 0.0016 },
  'gpt-4o-mini': { input: 0.00015, output: 0.0006 }
};

function normalizeKey(model: string): string {
  return model.toLowerCase();
}

export function getPricingForModel(model: string | undefined): Pricing {
  if (!model) return DEFAULT_PRICING;
  const key = normalizeKey(model);
  const exact = MODEL_PRICING[key];
  if (exact) {
    return exact;
  }
  // longest prefix wins, so gpt-5-mini-2025 does not price as gpt-5
  const match = Object.entries(MODEL_PRICING)
    .filter(([name]) => key.startsWith(name))
    .sort(([a], [b]) => b.length - a.length)[0];
  return match ? match[1] : DEFAULT_PRICING;
}
