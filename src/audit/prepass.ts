import * as core from '@actions/core';
import type { AuditProvider } from '../lib/provider.js';
import { enrichFiles } from './excerpts.js';
import { estimateTokens } from './files.js';
import { pricingFor } from './pricing.js';
import { buildClassificationPrompt } from './prompt.js';
import type { ContentTier, FileClassification, FileContent, Severity, TokenUsage } from './types.js';
import { emptyUsage } from './types.js';

export type PrepassSettings = {
  enabled: boolean;
  thresholdTokens: number;
  /** Disables the automatic trigger on pricing-tier crossings. */
  autoDisable: boolean;
  provider: string;
  model: string;
};

export type PrepassDecision = {
  run: boolean;
  reason: string;
};

export type PrepassResult = {
  classified: FileClassification[];
  files: FileContent[];
  originalCount: number;
  retainedCount: number;
  usage: TokenUsage;
};

/**
 * Runs when explicitly enabled and over the token threshold, or, unless
 * auto-disabled, when the prompt would cross the main model's pricing tier.
 */
export function shouldRunPrepass(
  files: FileContent[],
  settings: PrepassSettings,
  provider: string,
  model: string
): PrepassDecision {
  const tokens = estimateTokens(files);

  if (settings.enabled && tokens > settings.thresholdTokens) {
    return {
      run: true,
      reason: `pre-pass enabled and ~${Math.floor(tokens / 1000)}K tokens exceed the ${Math.floor(settings.thresholdTokens / 1000)}K threshold`,
    };
  }

  if (!settings.autoDisable) {
    const { key, pricing } = pricingFor(provider, model);
    if (pricing.tierThreshold !== undefined && tokens > pricing.tierThreshold) {
      return {
        run: true,
        reason: `~${Math.floor(tokens / 1000)}K tokens would cross the ${Math.floor(pricing.tierThreshold / 1000)}K pricing tier of ${key}`,
      };
    }
  }

  return { run: false, reason: '' };
}

const TIER_BY_SEVERITY: Record<Severity, ContentTier> = {
  high: 'full',
  medium: 'snippet',
  low: 'map',
};

/** One classification per input file; files the classifier did not mention are skipped. */
export async function classifyFiles(
  files: FileContent[],
  focusNames: string[],
  provider: AuditProvider
): Promise<{ classified: FileClassification[]; usage: TokenUsage }> {
  if (!files.length) return { classified: [], usage: emptyUsage() };

  const { findings, usage } = await provider.runToCompletion(files, buildClassificationPrompt(focusNames), '', {
    focusCount: 1,
    jobLabel: 'codesweep-prepass',
  });

  const byPath = new Map<string, FileClassification>();
  for (const f of findings) {
    if (byPath.has(f.file)) continue;
    byPath.set(f.file, { path: f.file, tier: TIER_BY_SEVERITY[f.severity], reason: f.description });
  }

  const classified = files.map((file) => byPath.get(file.path) ?? { path: file.path, tier: 'skip' as const });
  return { classified, usage };
}

export async function runPrepass(
  files: FileContent[],
  focusNames: string[],
  provider: AuditProvider
): Promise<PrepassResult> {
  const { classified, usage } = await classifyFiles(files, focusNames, provider);
  const enriched = enrichFiles(files, classified);

  const counts = { full: 0, snippet: 0, map: 0, skip: 0 };
  for (const c of classified) counts[c.tier]++;
  core.info(
    `  Pre-pass kept ${enriched.length}/${files.length} files ` +
      `(full ${counts.full}, snippet ${counts.snippet}, map ${counts.map}, skipped ${counts.skip})`
  );

  return {
    classified,
    files: enriched,
    originalCount: files.length,
    retainedCount: enriched.length,
    usage,
  };
}
