import * as core from '@actions/core';
import type { z } from 'zod';
import type { FileContent, Finding, TokenUsage } from '../audit/types.js';
import { ConfigError, describeZodError, ProviderApiError } from './errors.js';
import { sleep, type RetrySettings } from './http.js';

export type ProviderName = 'anthropic' | 'openai' | 'gemini';

export const PROVIDER_NAMES: readonly ProviderName[] = ['anthropic', 'openai', 'gemini'];

export function isProviderName(name: string): name is ProviderName {
  return PROVIDER_NAMES.some((p) => p === name);
}

export type SubmitOptions = {
  /** Number of focus areas in the prompt; scales the output token budget. */
  focusCount?: number;
};

export type PollOptions = {
  /** Focus assigned to findings that come back without one. */
  defaultFocus?: string;
};

export type RunOptions = SubmitOptions & PollOptions & { jobLabel?: string };

export type PollResult =
  | { status: 'processing'; processing: number }
  | { status: 'ended'; outcome: 'succeeded' | 'errored'; findings: Finding[]; usage: TokenUsage };

export type CompletedAudit = {
  findings: Finding[];
  usage: TokenUsage;
};

/** submit and poll form the asynchronous half; runToCompletion blocks. */
export interface AuditProvider {
  readonly name: ProviderName;
  readonly model: string;
  /** Whether runs on this provider are billed at the batch discount. */
  readonly batchDiscount: boolean;

  submit(
    files: FileContent[],
    systemPrompt: string,
    decisionContext: string,
    jobLabel: string,
    opts?: SubmitOptions
  ): Promise<string>;

  poll(jobId: string, opts?: PollOptions): Promise<PollResult>;

  /** Drops whatever the provider keeps locally for a job whose results are stored. */
  release(jobId: string): Promise<void>;

  runToCompletion(
    files: FileContent[],
    systemPrompt: string,
    decisionContext: string,
    opts?: RunOptions
  ): Promise<CompletedAudit>;
}

export type ProviderSettings = RetrySettings & {
  model: string;
  /** Where synchronous providers keep finished job results between processes. */
  stateDir: string;
  apiKey?: string;
  /** Delay between polls in runToCompletion. */
  pollIntervalMs?: number;
};

export const DEFAULT_POLL_INTERVAL_MS = 60_000;

export const MAX_TOKENS_PER_FOCUS = 4096;

export abstract class BaseProvider implements AuditProvider {
  abstract readonly name: ProviderName;
  abstract readonly batchDiscount: boolean;
  readonly model: string;
  protected readonly pollIntervalMs: number;

  constructor(protected readonly settings: ProviderSettings) {
    this.model = settings.model;
    this.pollIntervalMs = settings.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  abstract submit(
    files: FileContent[],
    systemPrompt: string,
    decisionContext: string,
    jobLabel: string,
    opts?: SubmitOptions
  ): Promise<string>;

  abstract poll(jobId: string, opts?: PollOptions): Promise<PollResult>;

  /** Batch APIs keep results remotely; nothing to drop. */
  async release(_jobId: string): Promise<void> {
    return;
  }

  /** Polls until the job ends. There is no upper bound on the wait. */
  async runToCompletion(
    files: FileContent[],
    systemPrompt: string,
    decisionContext: string,
    opts: RunOptions = {}
  ): Promise<CompletedAudit> {
    const jobId = await this.submit(files, systemPrompt, decisionContext, opts.jobLabel ?? 'codesweep-audit', opts);
    core.info(`  Job submitted: ${jobId}`);

    for (;;) {
      const result = await this.poll(jobId, opts);
      if (result.status === 'ended') return { findings: result.findings, usage: result.usage };
      core.info(`  Waiting... (${result.processing} processing)`);
      await sleep(this.pollIntervalMs);
    }
  }

  protected maxTokens(focusCount = 1): number {
    return MAX_TOKENS_PER_FOCUS * Math.max(1, focusCount);
  }

  protected retry(): RetrySettings {
    const { timeoutMs, maxRetries, retryBaseDelayMs } = this.settings;
    return { timeoutMs, maxRetries, retryBaseDelayMs };
  }
}

export function requireApiKey(explicit: string | undefined, envName: string): string {
  const key = explicit ?? process.env[envName];
  if (!key) throw new ConfigError(`${envName} is not set`);
  return key;
}

/** Validates a provider response against its wire schema. */
export function parseWire<T extends z.ZodTypeAny>(schema: T, data: unknown, label: string): z.output<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ProviderApiError(`${label} returned an unexpected payload: ${describeZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function parseJsonLines(text: string, label: string): unknown[] {
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim())
    .map((line, idx) => {
      try {
        return JSON.parse(line);
      } catch {
        throw new ProviderApiError(`${label} results line ${idx + 1} is not valid JSON`);
      }
    });
}
