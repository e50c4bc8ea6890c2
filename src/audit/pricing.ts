import type { ProviderName } from '../lib/provider.js';

/** Rates are USD per million tokens. */
export type ModelPricing = {
  provider: ProviderName;
  inputPerMillion: number;
  outputPerMillion: number;
  /** Prompt size above which the high-tier rates apply. */
  tierThreshold?: number;
  inputPerMillionHigh?: number;
  outputPerMillionHigh?: number;
  cacheReadPerMillion: number;
  cacheWritePerMillion: number;
  /** Fraction taken off the total for batch submissions, 0..1. */
  batchDiscount: number;
  contextWindow: number;
};

export const MODEL_PRICING: Record<string, ModelPricing> = {
  'claude-opus-4-6': {
    provider: 'anthropic',
    inputPerMillion: 5,
    outputPerMillion: 25,
    tierThreshold: 200_000,
    inputPerMillionHigh: 10,
    outputPerMillionHigh: 37.5,
    cacheReadPerMillion: 0.5,
    cacheWritePerMillion: 6.25,
    batchDiscount: 0.5,
    contextWindow: 200_000,
  },
  'claude-sonnet-4-5': {
    provider: 'anthropic',
    inputPerMillion: 3,
    outputPerMillion: 15,
    tierThreshold: 200_000,
    inputPerMillionHigh: 6,
    outputPerMillionHigh: 22.5,
    cacheReadPerMillion: 0.3,
    cacheWritePerMillion: 3.75,
    batchDiscount: 0.5,
    contextWindow: 200_000,
  },
  'gpt-4.1': {
    provider: 'openai',
    inputPerMillion: 2,
    outputPerMillion: 8,
    cacheReadPerMillion: 0.5,
    cacheWritePerMillion: 0,
    batchDiscount: 0.5,
    contextWindow: 1_047_576,
  },
  'gpt-4.1-mini': {
    provider: 'openai',
    inputPerMillion: 0.4,
    outputPerMillion: 1.6,
    cacheReadPerMillion: 0.1,
    cacheWritePerMillion: 0,
    batchDiscount: 0.5,
    contextWindow: 1_047_576,
  },
  'gemini-2.5-flash': {
    provider: 'gemini',
    inputPerMillion: 0.3,
    outputPerMillion: 2.5,
    cacheReadPerMillion: 0.075,
    cacheWritePerMillion: 0,
    batchDiscount: 0,
    contextWindow: 1_000_000,
  },
  'gemini-2.0-flash': {
    provider: 'gemini',
    inputPerMillion: 0.1,
    outputPerMillion: 0.4,
    cacheReadPerMillion: 0.025,
    cacheWritePerMillion: 0,
    batchDiscount: 0,
    contextWindow: 1_000_000,
  },
};

export const DEFAULT_PRICING_KEY = 'gemini-2.0-flash';

/** Maps a provider/model pair onto a price-table key, falling back by family. */
export function resolveModelKey(provider: string, model: string): string {
  if (Object.hasOwn(MODEL_PRICING, model)) return model;
  const m = model.toLowerCase();

  switch (provider) {
    case 'anthropic':
      return m.includes('opus') ? 'claude-opus-4-6' : 'claude-sonnet-4-5';
    case 'openai':
      return m.includes('mini') ? 'gpt-4.1-mini' : 'gpt-4.1';
    case 'gemini':
      return m.includes('2.5') || m.includes('2-5') ? 'gemini-2.5-flash' : 'gemini-2.0-flash';
    default:
      return DEFAULT_PRICING_KEY;
  }
}

export function pricingFor(provider: string, model: string): { key: string; pricing: ModelPricing } {
  const key = resolveModelKey(provider, model);
  return { key, pricing: MODEL_PRICING[key] ?? MODEL_PRICING[DEFAULT_PRICING_KEY] };
}

export type CostTokens = {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens?: number;
  cacheWriteTokens?: number;
};

/**
 * Cost in USD. Above the tier threshold only the excess input is billed at the
 * high rate, while all output moves to the high output rate. The batch
 * discount applies to the whole total.
 */
export function estimateCost(tokens: CostTokens, pricing: ModelPricing, useBatch = true): number {
  const { inputTokens, outputTokens } = tokens;
  const cacheRead = tokens.cacheReadTokens ?? 0;
  const cacheWrite = tokens.cacheWriteTokens ?? 0;
  if (inputTokens <= 0 && outputTokens <= 0 && cacheRead <= 0 && cacheWrite <= 0) return 0;

  const tier = pricing.tierThreshold;
  let inputCost: number;
  let outputCost: number;

  if (tier !== undefined && inputTokens > tier) {
    const highInput = pricing.inputPerMillionHigh ?? pricing.inputPerMillion;
    const highOutput = pricing.outputPerMillionHigh ?? pricing.outputPerMillion;
    inputCost = (tier / 1e6) * pricing.inputPerMillion + ((inputTokens - tier) / 1e6) * highInput;
    outputCost = (outputTokens / 1e6) * highOutput;
  } else {
    inputCost = (inputTokens / 1e6) * pricing.inputPerMillion;
    outputCost = (outputTokens / 1e6) * pricing.outputPerMillion;
  }

  const cacheCost = (cacheRead / 1e6) * pricing.cacheReadPerMillion + (cacheWrite / 1e6) * pricing.cacheWritePerMillion;

  let total = inputCost + outputCost + cacheCost;
  if (useBatch && pricing.batchDiscount > 0) total *= 1 - pricing.batchDiscount;
  return total;
}

/** Rough output size: a tenth of the input, capped per focus area. */
export function estimateOutputTokens(inputTokens: number, focusCount = 1): number {
  return Math.min(16_384, Math.floor(inputTokens * 0.1)) * Math.max(1, focusCount);
}

export function roundUsd(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
