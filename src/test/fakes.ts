import { parseFindingsResponse } from '../audit/parsing.js';
import { emptyUsage, type FileContent, type TokenUsage } from '../audit/types.js';
import type { ProviderFactory } from '../lib/llm.js';
import { BaseProvider, type PollOptions, type PollResult, type ProviderName, type SubmitOptions } from '../lib/provider.js';

export type Submission = {
  jobId: string;
  files: FileContent[];
  systemPrompt: string;
  decisionContext: string;
  jobLabel: string;
  focusCount?: number;
};

type JobState = { text: string; processing: boolean; error?: Error };

export const FAKE_USAGE: TokenUsage = { inputTokens: 1000, outputTokens: 200, cacheReadTokens: 0, cacheWriteTokens: 0 };

/**
 * In-process provider. `respond` produces the raw judge text for each
 * submission; tests flip jobs to processing or failing by id.
 */
export class FakeProvider extends BaseProvider {
  readonly batchDiscount = true;
  readonly submissions: Submission[] = [];
  readonly polls: string[] = [];
  readonly releases: string[] = [];
  private readonly jobs = new Map<string, JobState>();

  constructor(
    readonly name: ProviderName,
    private readonly respond: (submission: Omit<Submission, 'jobId'>) => string,
    model = 'fake-model'
  ) {
    super({ model, stateDir: '.', pollIntervalMs: 0 });
  }

  async submit(
    files: FileContent[],
    systemPrompt: string,
    decisionContext: string,
    jobLabel: string,
    opts: SubmitOptions = {}
  ): Promise<string> {
    const jobId = `${this.name}-job-${this.submissions.length + 1}`;
    const submission = { files, systemPrompt, decisionContext, jobLabel, focusCount: opts.focusCount };
    this.submissions.push({ jobId, ...submission });
    this.jobs.set(jobId, { text: this.respond(submission), processing: false });
    return jobId;
  }

  async poll(jobId: string, opts: PollOptions = {}): Promise<PollResult> {
    this.polls.push(jobId);
    const job = this.jobs.get(jobId);
    if (!job) return { status: 'ended', outcome: 'errored', findings: [], usage: emptyUsage() };
    if (job.error) throw job.error;
    if (job.processing) return { status: 'processing', processing: 1 };
    return { status: 'ended', outcome: 'succeeded', findings: parseFindingsResponse(job.text, opts.defaultFocus), usage: { ...FAKE_USAGE } };
  }

  override async release(jobId: string): Promise<void> {
    this.releases.push(jobId);
  }

  setProcessing(jobId: string, processing: boolean): void {
    const job = this.jobs.get(jobId);
    if (job) job.processing = processing;
  }

  setError(jobId: string, error: Error | undefined): void {
    const job = this.jobs.get(jobId);
    if (job) job.error = error;
  }
}

/** Hands out one shared FakeProvider per name so state survives across orchestrator calls. */
export function fakeFactory(respond: (submission: Omit<Submission, 'jobId'>) => string): {
  factory: ProviderFactory;
  providers: Map<string, FakeProvider>;
} {
  const providers = new Map<string, FakeProvider>();
  const factory: ProviderFactory = (name, settings) => {
    let provider = providers.get(name);
    if (!provider) {
      const providerName: ProviderName = name === 'anthropic' || name === 'openai' ? name : 'gemini';
      provider = new FakeProvider(providerName, respond, settings.model);
      providers.set(name, provider);
    }
    return provider;
  };
  return { factory, providers };
}

export function findingsJson(
  findings: Array<{ severity: 'high' | 'medium' | 'low'; file: string; title: string; line?: number; focus?: string; description?: string }>
): string {
  return JSON.stringify({
    findings: findings.map(({ description, ...rest }) => ({ ...rest, description: description ?? `About ${rest.title}` })),
  });
}
