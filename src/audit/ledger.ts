import { z } from 'zod';
import { appendJsonl, readJsonl } from '../storage/jsonl.js';
import { estimateCost, pricingFor, roundUsd } from './pricing.js';
import type { TokenUsage } from './types.js';

const ledgerEntrySchema = z.object({
  timestamp: z.string(),
  repo: z.string(),
  focus: z.string(),
  provider: z.string(),
  model: z.string(),
  input_tokens: z.number(),
  output_tokens: z.number(),
  cache_read_tokens: z.number().default(0),
  cache_write_tokens: z.number().default(0),
  file_count: z.number(),
  cost_estimate_usd: z.number(),
});

export type LedgerEntry = z.infer<typeof ledgerEntrySchema>;

export type LedgerAppend = {
  repo: string;
  focus: string;
  provider: string;
  model: string;
  usage: TokenUsage;
  fileCount: number;
  /** Whether the batch discount applies to this run. */
  useBatch: boolean;
  timestamp?: Date;
};

/** Append-only JSONL log of per-run token usage and estimated cost. */
export class CostLedger {
  constructor(readonly filePath: string) {}

  append(run: LedgerAppend): LedgerEntry {
    const { pricing } = pricingFor(run.provider, run.model);
    const entry: LedgerEntry = {
      timestamp: (run.timestamp ?? new Date()).toISOString(),
      repo: run.repo,
      focus: run.focus,
      provider: run.provider,
      model: run.model,
      input_tokens: run.usage.inputTokens,
      output_tokens: run.usage.outputTokens,
      cache_read_tokens: run.usage.cacheReadTokens,
      cache_write_tokens: run.usage.cacheWriteTokens,
      file_count: run.fileCount,
      cost_estimate_usd: roundUsd(estimateCost(run.usage, pricing, run.useBatch)),
    };
    appendJsonl(this.filePath, entry);
    return entry;
  }

  /** All well-formed entries in append order; malformed lines are skipped. */
  readEntries(): LedgerEntry[] {
    const out: LedgerEntry[] = [];
    for (const record of readJsonl(this.filePath)) {
      const parsed = ledgerEntrySchema.safeParse(record.value);
      if (parsed.success) out.push(parsed.data);
    }
    return out;
  }

  lastN(n: number): LedgerEntry[] {
    return n > 0 ? this.readEntries().slice(-n) : [];
  }

  lastNDays(days: number, now: Date = new Date()): LedgerEntry[] {
    const cutoff = now.getTime() - days * 86_400_000;
    return this.readEntries().filter((e) => {
      const t = Date.parse(e.timestamp);
      return Number.isFinite(t) && t >= cutoff;
    });
  }
}
