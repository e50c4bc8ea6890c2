import type { LedgerEntry } from './ledger.js';
import { roundUsd } from './pricing.js';

export type CostSummary = {
  audits: number;
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheWriteTokens: number;
  /** Share of input served from cache, in percent; undefined when nothing was cached. */
  cacheSharePct?: number;
  totalCostUsd: number;
  avgCostUsd: number;
  projectedMonthlyUsd: number;
  /** Last five audits, newest first. */
  recent: LedgerEntry[];
};

const DAY_MS = 86_400_000;

function utcDay(timestamp: string): number | undefined {
  const t = Date.parse(timestamp);
  if (!Number.isFinite(t)) return undefined;
  const d = new Date(t);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

/** Days between the first and last entry, never less than one. */
function daysCovered(entries: LedgerEntry[]): number {
  const days = entries.map((e) => utcDay(e.timestamp)).filter((d): d is number => d !== undefined);
  if (days.length < 2) return 1;
  return Math.max(Math.round((Math.max(...days) - Math.min(...days)) / DAY_MS), 1);
}

export function summarizeCosts(entries: LedgerEntry[]): CostSummary {
  const sum = (pick: (e: LedgerEntry) => number) => entries.reduce((acc, e) => acc + pick(e), 0);

  const inputTokens = sum((e) => e.input_tokens);
  const cacheReadTokens = sum((e) => e.cache_read_tokens);
  const totalCostUsd = sum((e) => e.cost_estimate_usd);
  const audits = entries.length;

  const cacheBase = inputTokens + cacheReadTokens;
  return {
    audits,
    inputTokens,
    outputTokens: sum((e) => e.output_tokens),
    cacheReadTokens,
    cacheWriteTokens: sum((e) => e.cache_write_tokens),
    cacheSharePct: cacheReadTokens > 0 && cacheBase > 0 ? Math.round((cacheReadTokens / cacheBase) * 1000) / 10 : undefined,
    totalCostUsd: roundUsd(totalCostUsd),
    avgCostUsd: audits ? roundUsd(totalCostUsd / audits) : 0,
    projectedMonthlyUsd: audits ? roundUsd((totalCostUsd / daysCovered(entries)) * 30) : 0,
    recent: entries.slice(-5).reverse(),
  };
}

export function formatTokens(n: number): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 1_000) return `${(n / 1_000).toFixed(1)}K`;
  return String(n);
}

export function renderCostSummary(summary: CostSummary, days: number): string {
  const lines: string[] = [];
  lines.push(`# Cost summary (last ${days} days)`);
  lines.push('');

  if (!summary.audits) {
    lines.push('No audits recorded yet.');
    lines.push('');
    return lines.join('\n');
  }

  lines.push(`Audits: ${summary.audits}`);
  lines.push(`Input tokens: ${formatTokens(summary.inputTokens)}`);
  lines.push(`Output tokens: ${formatTokens(summary.outputTokens)}`);
  if (summary.cacheSharePct !== undefined) {
    lines.push(`Cache reads: ${formatTokens(summary.cacheReadTokens)} (${summary.cacheSharePct}% of input)`);
  }
  lines.push(`Total cost: $${summary.totalCostUsd.toFixed(2)}`);
  lines.push(`Average per audit: $${summary.avgCostUsd.toFixed(4)}`);
  lines.push(`Projected monthly: $${summary.projectedMonthlyUsd.toFixed(2)}`);
  lines.push('');

  lines.push('## Recent audits');
  for (const e of summary.recent) {
    lines.push(`- ${e.timestamp.slice(0, 10)} ${e.repo} [${e.focus}] ${e.provider}/${e.model}: $${e.cost_estimate_usd.toFixed(4)} (${e.file_count} files)`);
  }
  lines.push('');

  return lines.join('\n');
}
