import * as core from '@actions/core';
import type { AuditConfig, RepoConfig } from '../config.js';
import { providerForRepo, todayFocus } from '../config.js';
import { ConfigError, errorMessage, ModelOutputError, ProviderApiError } from '../lib/errors.js';
import { createProvider as defaultCreateProvider, DEFAULT_MODELS, type ProviderFactory } from '../lib/llm.js';
import { isProviderName, type AuditProvider, type PollResult, type ProviderName } from '../lib/provider.js';
import { filterFindings, formatDecisionContext, loadDecisions } from '../memory/decisions.js';
import { estimateTokens, selectFiles } from './files.js';
import { buildCombinedPrompt, focusLabel, getFocusArea, patternsFor } from './focus.js';
import { normalizeFocus, type ScheduleEntry } from './frames.js';
import { CostLedger } from './ledger.js';
import { runPrepass, shouldRunPrepass } from './prepass.js';
import { estimateCost, estimateOutputTokens, pricingFor } from './pricing.js';
import type { ResultHandler } from './publish.js';
import {
  clearPendingBatch,
  loadPendingBatch,
  markRetrieved,
  retrievedBatchIds,
  saveFindingsSnapshot,
  savePendingBatch,
  statePaths,
  type StatePaths,
} from './state.js';
import type { AuditResult, FileContent, Finding, PendingBatch, PendingBatchEntry, TokenUsage } from './types.js';

export type OrchestratorDeps = {
  createProvider?: ProviderFactory;
  onResult?: ResultHandler;
  now?: () => Date;
  pollIntervalMs?: number;
};

export type AuditRequest = {
  repo?: string;
  /** Focus override: a focus name, comma list, frame name, `all` or `off`. */
  focus?: ScheduleEntry;
  provider?: string;
  dryRun?: boolean;
};

export type FailedBatch = {
  repo: string;
  batchId: string;
  error: string;
};

export type RetrieveOutcome = {
  /** True when there was nothing to do: no pending record, or it was already retrieved. */
  skipped: boolean;
  results: AuditResult[];
  pending: PendingBatchEntry[];
  failed: FailedBatch[];
};

type PreparedAudit = {
  repo: RepoConfig;
  providerName: ProviderName;
  files: FileContent[];
  systemPrompt: string;
  decisionContext: string;
};

type FocusPlan = {
  names: string[];
  label: string;
  defaultFocus?: string;
  systemPrompt: string;
  patterns: string[];
};

function modelFamily(model: string): ProviderName | undefined {
  const m = model.toLowerCase();
  if (m.startsWith('claude')) return 'anthropic';
  if (m.startsWith('gpt') || /^o\d/.test(m)) return 'openai';
  if (m.startsWith('gemini')) return 'gemini';
  return undefined;
}

/**
 * Drives audits over the configured repositories: synchronous runs, and the
 * submit/retrieve split where the gap between the two lives in the state dir.
 */
export class AuditOrchestrator {
  private readonly paths: StatePaths;
  private readonly ledger: CostLedger;
  private readonly createProvider: ProviderFactory;
  private readonly onResult?: ResultHandler;
  private readonly now: () => Date;
  private readonly pollIntervalMs?: number;

  constructor(private readonly config: AuditConfig, deps: OrchestratorDeps = {}) {
    this.paths = statePaths(config.stateDir);
    this.ledger = new CostLedger(this.paths.ledger);
    this.createProvider = deps.createProvider ?? defaultCreateProvider;
    this.onResult = deps.onResult;
    this.now = deps.now ?? (() => new Date());
    this.pollIntervalMs = deps.pollIntervalMs;
  }

  /** Focus names for this run; throws on names that are not registered. */
  resolveFocusNames(override?: ScheduleEntry): string[] {
    const raw = override ?? todayFocus(this.config, this.now());
    const names = [...new Set(normalizeFocus(raw))];
    for (const name of names) getFocusArea(name);
    return names;
  }

  modelFor(provider: string): string {
    const override = this.config.models[provider];
    if (override) return override;
    if (modelFamily(this.config.model) === provider) return this.config.model;
    return isProviderName(provider) ? DEFAULT_MODELS[provider] : this.config.model;
  }

  private provider(name: string, model: string = this.modelFor(name)): AuditProvider {
    return this.createProvider(name, { model, stateDir: this.config.stateDir, pollIntervalMs: this.pollIntervalMs });
  }

  private selectRepos(name?: string): RepoConfig[] {
    if (!name) return this.config.repos;
    const repo = this.config.repos.find((r) => r.name === name);
    if (!repo) {
      throw new ConfigError(`Unknown repository: ${name}. Configured: ${this.config.repos.map((r) => r.name).join(', ') || '(none)'}`);
    }
    return [repo];
  }

  private planFocus(names: string[]): FocusPlan {
    const areas = names.map((n) => getFocusArea(n));
    return {
      names,
      label: focusLabel(names),
      defaultFocus: names.length === 1 ? names[0] : undefined,
      systemPrompt: buildCombinedPrompt(areas),
      patterns: patternsFor(areas),
    };
  }

  /** Validates every name up front so nothing is submitted for a run that would fail later. */
  private planProviders(repos: RepoConfig[], override?: string): Array<{ repo: RepoConfig; providerName: ProviderName }> {
    const plan = repos.map((repo) => {
      const name = override ?? providerForRepo(this.config, repo.name);
      if (!isProviderName(name)) throw new ConfigError(`Unknown provider "${name}" for repository ${repo.name}`);
      return { repo, providerName: name };
    });
    if (this.config.prepass.enabled || !this.config.prepass.autoDisable) {
      if (!isProviderName(this.config.prepass.provider)) {
        throw new ConfigError(`Unknown pre-pass provider: ${this.config.prepass.provider}`);
      }
    }
    return plan;
  }

  private async prepare(repo: RepoConfig, providerName: ProviderName, focus: FocusPlan): Promise<PreparedAudit | undefined> {
    core.info(`[${repo.name}] Gathering files for ${focus.label}...`);
    let files = await selectFiles(repo.path, focus.patterns, repo.exclude);
    core.info(`[${repo.name}] Found ${files.length} files`);
    if (!files.length) return undefined;

    const model = this.modelFor(providerName);
    const prepass = shouldRunPrepass(files, this.config.prepass, providerName, model);
    if (prepass.run) {
      core.info(`[${repo.name}] Running pre-pass: ${prepass.reason}`);
      const { provider: ppName, model: ppModel } = this.config.prepass;
      const result = await runPrepass(files, focus.names, this.provider(ppName, ppModel));
      this.recordUsage(repo.name, `prepass:${focus.label}`, ppName, ppModel, result.usage, result.originalCount, false);
      files = result.files;
      if (!files.length) {
        core.info(`[${repo.name}] Pre-pass retained no files`);
        return undefined;
      }
    }

    this.checkBudget(repo.name, files, providerName, model, focus.names.length);

    const decisions = loadDecisions(this.config.decisions.path);
    if (decisions.length) core.info(`[${repo.name}] Including ${decisions.length} prior decisions as context`);

    return {
      repo,
      providerName,
      files,
      systemPrompt: focus.systemPrompt,
      decisionContext: formatDecisionContext(decisions),
    };
  }

  /** Warns before submitting when the rough cost of the prompt is over the per-run budget. */
  private checkBudget(repo: string, files: FileContent[], providerName: ProviderName, model: string, focusCount: number): void {
    const inputTokens = estimateTokens(files);
    const { pricing } = pricingFor(providerName, model);
    const cost = estimateCost({ inputTokens, outputTokens: estimateOutputTokens(inputTokens, focusCount) }, pricing);
    const { maxPerRunUsd } = this.config.budget;
    if (cost > maxPerRunUsd) {
      core.warning(`[${repo}] Estimated cost $${cost.toFixed(2)} exceeds the $${maxPerRunUsd.toFixed(2)} per-run budget`);
    }
  }

  private recordUsage(
    repo: string,
    focus: string,
    provider: string,
    model: string,
    usage: TokenUsage,
    fileCount: number,
    useBatch: boolean
  ): void {
    const entry = this.ledger.append({ repo, focus, provider, model, usage, fileCount, useBatch, timestamp: this.now() });
    const { alertThresholdUsd } = this.config.budget;
    if (entry.cost_estimate_usd > alertThresholdUsd) {
      core.warning(`[${repo}] Estimated cost $${entry.cost_estimate_usd.toFixed(4)} exceeds the $${alertThresholdUsd.toFixed(2)} alert threshold`);
    }
  }

  private async finalize(params: {
    repo: RepoConfig;
    label: string;
    provider: AuditProvider;
    findings: Finding[];
    usage: TokenUsage;
    fileCount: number;
  }): Promise<AuditResult> {
    const { repo, label, provider, findings, usage, fileCount } = params;

    // Loaded before anything is written so a corrupt store aborts without side effects.
    const decisions = loadDecisions(this.config.decisions.path);

    if (fileCount > 0) {
      this.recordUsage(repo.name, label, provider.name, provider.model, usage, fileCount, provider.batchDiscount);
    }

    const now = this.now();
    const { newFindings, resolvedCount } = filterFindings(findings, decisions, repo.path, this.config.decisions.expiryDays, now);
    const result: AuditResult = {
      repo: repo.name,
      focus: label,
      provider: provider.name,
      findings,
      newFindings,
      resolvedCount,
      timestamp: now.toISOString(),
    };

    saveFindingsSnapshot(this.paths.snapshotDir, result);
    core.info(`[${repo.name}] ${findings.length} findings, ${newFindings.length} new, ${resolvedCount} previously resolved`);
    return result;
  }

  /**
   * Submits one job per repository and records them as the pending batch.
   * Returns null when the schedule says `off` for today.
   */
  async submit(req: AuditRequest = {}): Promise<PendingBatch | null> {
    const focusNames = this.resolveFocusNames(req.focus);
    if (!focusNames.length) {
      core.info('No focus scheduled for today, nothing to submit.');
      return null;
    }
    const plan = this.planProviders(this.selectRepos(req.repo), req.provider);
    const focus = this.planFocus(focusNames);

    const pending: PendingBatch = {
      submitted_at: this.now().toISOString(),
      focus: focus.label,
      focus_names: focus.names,
      all_batch_ids: [],
      batches: [],
    };

    for (const { repo, providerName } of plan) {
      const prepared = await this.prepare(repo, providerName, focus);
      if (!prepared) {
        core.info(`[${repo.name}] No files to audit, skipping`);
        continue;
      }

      if (req.dryRun) {
        core.info(`[${repo.name}] Dry run: would submit ${prepared.files.length} files to ${providerName}`);
        continue;
      }

      const provider = this.provider(providerName);
      const batchId = await provider.submit(
        prepared.files,
        prepared.systemPrompt,
        prepared.decisionContext,
        `${repo.name}-${focus.label}`,
        { focusCount: focus.names.length }
      );
      core.info(`[${repo.name}] Submitted ${prepared.files.length} files to ${providerName}: ${batchId}`);

      pending.batches.push({ repo: repo.name, batch_id: batchId, provider: providerName, file_count: prepared.files.length });
      pending.all_batch_ids.push(batchId);
    }

    if (pending.batches.length) {
      savePendingBatch(this.paths.pendingBatch, pending);
      core.info(`Pending batch saved to ${this.paths.pendingBatch}`);
    }
    return pending;
  }

  /**
   * Collects finished jobs from the pending batch. Safe to repeat: each job is
   * recorded in the retrieval marker as soon as it is finalized, and recorded
   * jobs are never processed again, even when an older pending file comes back.
   */
  async retrieve(opts: { pendingPath?: string } = {}): Promise<RetrieveOutcome> {
    const pendingPath = opts.pendingPath ?? this.paths.pendingBatch;
    const pending = loadPendingBatch(pendingPath);
    if (!pending) {
      core.info(`No pending batch at ${pendingPath}`);
      return { skipped: true, results: [], pending: [], failed: [] };
    }

    const allIds = pending.all_batch_ids.length ? pending.all_batch_ids : pending.batches.map((b) => b.batch_id);
    const done = new Set([...retrievedBatchIds(this.paths.retrievalMarker)].filter((id) => allIds.includes(id)));
    const open = pending.batches.filter((b) => !done.has(b.batch_id));
    if (!open.length) {
      core.info('Pending batch was already retrieved, skipping.');
      clearPendingBatch(pendingPath);
      return { skipped: true, results: [], pending: [], failed: [] };
    }

    const focusNames = pending.focus_names.length ? pending.focus_names : normalizeFocus(pending.focus.split('+'));
    const label = pending.focus || focusLabel(focusNames);
    const defaultFocus = focusNames.length === 1 ? focusNames[0] : undefined;

    // Providers are built before any job is touched so a bad name or missing key fails cleanly.
    const providers = new Map<string, AuditProvider>();
    for (const batch of open) {
      if (providers.has(batch.provider)) continue;
      if (!isProviderName(batch.provider)) throw new ConfigError(`Unknown provider "${batch.provider}" in ${pendingPath}`);
      providers.set(batch.provider, this.provider(batch.provider));
    }

    const settle = async (batchId: string, provider?: AuditProvider) => {
      done.add(batchId);
      markRetrieved(this.paths.retrievalMarker, allIds.filter((id) => done.has(id)), this.now());
      const left = pending.batches.filter((b) => !done.has(b.batch_id));
      if (left.length) savePendingBatch(pendingPath, { ...pending, all_batch_ids: allIds, batches: left });
      else clearPendingBatch(pendingPath);
      await provider?.release(batchId);
    };

    const results: AuditResult[] = [];
    const remaining: PendingBatchEntry[] = [];
    const failed: FailedBatch[] = [];

    for (const batch of open) {
      const repo = this.config.repos.find((r) => r.name === batch.repo);
      const provider = providers.get(batch.provider);
      if (!repo || !provider) {
        core.warning(`[${batch.repo}] Repository is no longer configured, dropping batch ${batch.batch_id}`);
        await settle(batch.batch_id, provider);
        continue;
      }

      core.info(`[${repo.name}] Checking ${batch.provider} job ${batch.batch_id}...`);

      let poll: PollResult;
      try {
        poll = await provider.poll(batch.batch_id, { defaultFocus });
      } catch (err) {
        if (err instanceof ModelOutputError) {
          core.error(`[${repo.name}] Job ${batch.batch_id} returned malformed output: ${err.message}`);
          failed.push({ repo: repo.name, batchId: batch.batch_id, error: err.message });
          await settle(batch.batch_id, provider);
          continue;
        }
        if (err instanceof ProviderApiError) {
          core.error(`[${repo.name}] Could not poll job ${batch.batch_id}, keeping it pending: ${errorMessage(err)}`);
          remaining.push(batch);
          continue;
        }
        throw err;
      }

      if (poll.status === 'processing') {
        core.info(`[${repo.name}] Still processing (${poll.processing} remaining)`);
        remaining.push(batch);
        continue;
      }
      if (poll.outcome === 'errored') {
        core.warning(`[${repo.name}] Job ${batch.batch_id} ended without a successful response`);
      }

      const result = await this.finalize({
        repo,
        label,
        provider,
        findings: poll.findings,
        usage: poll.usage,
        fileCount: batch.file_count,
      });
      await settle(batch.batch_id, provider);
      results.push(result);

      if (!this.onResult) continue;
      try {
        await this.onResult(result, repo);
      } catch (err) {
        core.error(`[${repo.name}] Publishing results of job ${batch.batch_id} failed: ${errorMessage(err)}`);
        failed.push({ repo: repo.name, batchId: batch.batch_id, error: `publishing failed: ${errorMessage(err)}` });
      }
    }

    return { skipped: false, results, pending: remaining, failed };
  }

  /** Submit and wait per repository; nothing is left pending. */
  async runToCompletion(req: AuditRequest = {}): Promise<AuditResult[]> {
    const focusNames = this.resolveFocusNames(req.focus);
    if (!focusNames.length) {
      core.info('No focus scheduled for today, nothing to run.');
      return [];
    }
    const plan = this.planProviders(this.selectRepos(req.repo), req.provider);
    const focus = this.planFocus(focusNames);
    const results: AuditResult[] = [];

    for (const { repo, providerName } of plan) {
      const prepared = await this.prepare(repo, providerName, focus);
      if (!prepared) {
        core.info(`[${repo.name}] No files to audit, skipping`);
        continue;
      }
      if (req.dryRun) {
        core.info(`[${repo.name}] Dry run: would send ${prepared.files.length} files to ${providerName}`);
        continue;
      }

      const provider = this.provider(providerName);
      const { findings, usage } = await provider.runToCompletion(prepared.files, prepared.systemPrompt, prepared.decisionContext, {
        focusCount: focus.names.length,
        defaultFocus: focus.defaultFocus,
        jobLabel: `${repo.name}-${focus.label}`,
      });

      const result = await this.finalize({ repo, label: focus.label, provider, findings, usage, fileCount: prepared.files.length });
      if (this.onResult) await this.onResult(result, repo);
      results.push(result);
    }

    return results;
  }
}
