import { formatTokens } from './cost-summary.js';
import { estimateTokens } from './files.js';
import { FRAME_LABELS, frameForFocus, normalizeFocus, type ScheduleEntry } from './frames.js';
import { estimateCost, estimateOutputTokens, MODEL_PRICING } from './pricing.js';
import type { FileContent } from './types.js';

const TRIAGE_MODEL = 'gemini-2.5-flash';
const TRIAGE_OUTPUT_TOKENS_PER_FILE = 60;

export type PrepassReduction = {
  reducedTokens: number;
  triageCostUsd: number;
  high: number;
  medium: number;
  lowOrSkip: number;
};

/**
 * Guesses what a pre-pass would keep without running one: the smallest files
 * make up the 15% high and 30% medium tiers, the rest is mapped or skipped.
 */
export function estimatePrepassReduction(files: FileContent[]): PrepassReduction {
  if (!files.length) return { reducedTokens: 0, triageCostUsd: 0, high: 0, medium: 0, lowOrSkip: 0 };

  const n = files.length;
  const bySize = [...files].sort((a, b) => a.content.length - b.content.length);
  const high = Math.max(1, Math.round(n * 0.15));
  const medium = Math.max(1, Math.round(n * 0.3));
  const kept = bySize.slice(0, high + medium);

  const triageCostUsd = estimateCost(
    { inputTokens: estimateTokens(files), outputTokens: n * TRIAGE_OUTPUT_TOKENS_PER_FILE },
    MODEL_PRICING[TRIAGE_MODEL],
    false
  );

  return {
    reducedTokens: kept.reduce((acc, f) => acc + Math.floor(f.content.length / 4), 0),
    triageCostUsd,
    high,
    medium,
    lowOrSkip: Math.max(0, n - high - medium),
  };
}

/** Shared frame label when every focus belongs to the same frame. */
export function frameLabel(focusNames: string[]): string | undefined {
  const frames = new Set(focusNames.map(frameForFocus).filter((f): f is string => f !== undefined));
  if (frames.size !== 1) return undefined;
  const [frame] = frames;
  return FRAME_LABELS[frame];
}

export function countWeeklyRuns(schedule: Record<string, ScheduleEntry>): number {
  return Object.values(schedule).filter((entry) => normalizeFocus(entry).length > 0).length;
}

export type EstimateInput = {
  repo: string;
  focusNames: string[];
  files: FileContent[];
  provider: string;
  modelKey: string;
  schedule: Record<string, ScheduleEntry>;
};

type Alternative = { key: string; provider: string; cost: number; savingsPct: number };

function usd(n: number): string {
  return `$${n.toFixed(2)}`;
}

export function buildEstimateReport(input: EstimateInput): string {
  const { repo, focusNames, files, provider, modelKey } = input;
  const pricing = MODEL_PRICING[modelKey] ?? MODEL_PRICING[TRIAGE_MODEL];
  const lines: string[] = [''];

  const frame = frameLabel(focusNames);
  lines.push(`  ${repo}: ${focusNames.join(' + ')}${frame ? ` (${frame})` : ''}`);
  lines.push('');

  const totalTokens = estimateTokens(files);
  const outputTokens = estimateOutputTokens(totalTokens, focusNames.length);
  lines.push(`  Files:     ${files.length} files, ${formatTokens(totalTokens)} tokens`);
  lines.push(`  Provider:  ${provider} (${modelKey})`);
  lines.push('');

  const useBatch = pricing.batchDiscount > 0;
  const cost = estimateCost({ inputTokens: totalTokens, outputTokens }, pricing, useBatch);
  const tiered = pricing.tierThreshold !== undefined && totalTokens > pricing.tierThreshold;

  if (tiered && pricing.tierThreshold !== undefined) {
    lines.push(`  ! Cost estimate: ~${usd(cost)}`);
    lines.push(`    ${formatTokens(totalTokens)} tokens exceed the ${formatTokens(pricing.tierThreshold)} standard tier.`);
    lines.push(`    Tiered pricing applies: ${usd(pricing.inputPerMillionHigh ?? pricing.inputPerMillion)}/M input.`);
  } else {
    lines.push(`  Cost estimate: ~${usd(cost)}`);
  }
  if (useBatch) lines.push(`    Batch discount of ${Math.round(pricing.batchDiscount * 100)}% applied.`);
  lines.push('');

  const alternatives: Alternative[] = [];
  for (const [key, alt] of Object.entries(MODEL_PRICING)) {
    if (key === modelKey) continue;
    const altCost = estimateCost({ inputTokens: totalTokens, outputTokens }, alt, alt.batchDiscount > 0);
    if (cost > 0 && altCost < cost) {
      alternatives.push({ key, provider: alt.provider, cost: altCost, savingsPct: Math.floor((1 - altCost / cost) * 100) });
    }
  }
  alternatives.sort((a, b) => a.cost - b.cost);

  let prepass: { reduction: PrepassReduction; totalCost: number; savingsPct: number } | undefined;
  if (tiered) {
    const reduction = estimatePrepassReduction(files);
    const reducedOutput = estimateOutputTokens(reduction.reducedTokens, focusNames.length);
    const totalCost =
      estimateCost({ inputTokens: reduction.reducedTokens, outputTokens: reducedOutput }, pricing, useBatch) + reduction.triageCostUsd;
    if (cost > 0 && totalCost < cost) {
      prepass = { reduction, totalCost, savingsPct: Math.floor((1 - totalCost / cost) * 100) };
    }
  }

  if (alternatives.length || prepass) {
    lines.push('  Alternatives:');
    for (const alt of alternatives) {
      const desc = `${alt.provider} (${alt.key})`.padEnd(38);
      lines.push(`    ${desc} ~${usd(alt.cost)}   ${alt.savingsPct}% cheaper`);
    }
    if (prepass) {
      const desc = `${provider} + pre-pass`.padEnd(38);
      lines.push(`    ${desc} ~${usd(prepass.totalCost)}   ${prepass.savingsPct}% cheaper`);
    }
    lines.push('');
  }

  if (prepass) {
    const { reduction } = prepass;
    lines.push('  Pre-pass estimate:');
    lines.push(`    Triage with ${TRIAGE_MODEL}: ~${usd(reduction.triageCostUsd)}`);
    lines.push(
      `    Expected reduction: ${formatTokens(totalTokens)} -> ~${formatTokens(reduction.reducedTokens)} tokens ` +
        `(high: ${reduction.high} files, medium: ${reduction.medium}, low/skip: ${reduction.lowOrSkip})`
    );
    lines.push('');
  }

  const activeDays = countWeeklyRuns(input.schedule);
  const monthlyRuns = (activeDays * 52) / 12;
  lines.push(`  Monthly estimate: ~${usd(cost * monthlyRuns)} (${activeDays} runs/week at current schedule)`);
  if (alternatives.length) {
    lines.push(`  Monthly with ${alternatives[0].key}: ~${usd(alternatives[0].cost * monthlyRuns)}`);
  }
  lines.push('');

  return lines.join('\n');
}
