import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { z } from 'zod';
import { parseFindingsResponse } from '../audit/parsing.js';
import { buildUserMessage } from '../audit/prompt.js';
import type { FileContent, TokenUsage } from '../audit/types.js';
import { emptyUsage } from '../audit/types.js';
import { readJsonFile, removeFile, writeJsonFile } from '../storage/json.js';
import { fetchJson } from './http.js';
import {
  BaseProvider,
  parseWire,
  requireApiKey,
  type CompletedAudit,
  type PollOptions,
  type PollResult,
  type ProviderSettings,
  type RunOptions,
  type SubmitOptions,
} from './provider.js';

const API_BASE = 'https://generativelanguage.googleapis.com/v1beta/models';

const JOB_ID_RE = /^gemini-[0-9a-f-]{36}$/;

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).default([]) }).optional(),
      })
    )
    .default([]),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      cachedContentTokenCount: z.number().optional(),
    })
    .optional(),
});

const syncJobSchema = z.object({
  model: z.string(),
  created_at: z.string(),
  text: z.string(),
  usage: z.object({
    inputTokens: z.number(),
    outputTokens: z.number(),
    cacheReadTokens: z.number(),
    cacheWriteTokens: z.number(),
  }),
});

type GenerateResult = { text: string; usage: TokenUsage };

/**
 * Gemini answers synchronously. submit() stores the answer under
 * `<stateDir>/sync-jobs/` so that a poll from a later process sees the job as
 * ended; release() deletes it once the results are recorded.
 */
export class GeminiProvider extends BaseProvider {
  readonly name = 'gemini' as const;
  readonly batchDiscount = false;
  private readonly apiKey: string;

  constructor(settings: ProviderSettings) {
    super(settings);
    this.apiKey = requireApiKey(settings.apiKey, 'GOOGLE_API_KEY');
  }

  private jobFile(jobId: string): string {
    return path.join(this.settings.stateDir, 'sync-jobs', `${jobId}.json`);
  }

  private async generate(systemPrompt: string, userMessage: string, maxOutputTokens: number): Promise<GenerateResult> {
    const data = await fetchJson({
      label: 'Gemini',
      url: `${API_BASE}/${encodeURIComponent(this.model)}:generateContent`,
      method: 'POST',
      headers: { 'x-goog-api-key': this.apiKey, 'Content-Type': 'application/json' },
      body: JSON.stringify({
        systemInstruction: { parts: [{ text: systemPrompt }] },
        contents: [{ role: 'user', parts: [{ text: userMessage }] }],
        generationConfig: { responseMimeType: 'application/json', maxOutputTokens },
      }),
      ...this.retry(),
    });
    const resp = parseWire(generateResponseSchema, data, 'Gemini generateContent');

    const text = (resp.candidates[0]?.content?.parts ?? []).map((p) => p.text ?? '').join('');
    const meta = resp.usageMetadata;
    const cached = meta?.cachedContentTokenCount ?? 0;
    return {
      text,
      usage: {
        inputTokens: Math.max(0, (meta?.promptTokenCount ?? 0) - cached),
        outputTokens: meta?.candidatesTokenCount ?? 0,
        cacheReadTokens: cached,
        cacheWriteTokens: 0,
      },
    };
  }

  async submit(
    files: FileContent[],
    systemPrompt: string,
    decisionContext: string,
    _jobLabel: string,
    opts: SubmitOptions = {}
  ): Promise<string> {
    const result = await this.generate(systemPrompt, buildUserMessage(files, decisionContext), this.maxTokens(opts.focusCount));
    const jobId = `gemini-${randomUUID()}`;
    writeJsonFile(this.jobFile(jobId), {
      model: this.model,
      created_at: new Date().toISOString(),
      text: result.text,
      usage: result.usage,
    });
    return jobId;
  }

  async poll(jobId: string, opts: PollOptions = {}): Promise<PollResult> {
    const record = JOB_ID_RE.test(jobId) ? readJsonFile(this.jobFile(jobId)) : undefined;
    if (record === undefined) {
      return { status: 'ended', outcome: 'errored', findings: [], usage: emptyUsage() };
    }
    const job = parseWire(syncJobSchema, record, 'Gemini sync job record');
    return {
      status: 'ended',
      outcome: 'succeeded',
      findings: parseFindingsResponse(job.text, opts.defaultFocus),
      usage: job.usage,
    };
  }

  override async release(jobId: string): Promise<void> {
    if (JOB_ID_RE.test(jobId)) removeFile(this.jobFile(jobId));
  }

  /** No job record is needed when the caller waits for the answer itself. */
  override async runToCompletion(
    files: FileContent[],
    systemPrompt: string,
    decisionContext: string,
    opts: RunOptions = {}
  ): Promise<CompletedAudit> {
    const result = await this.generate(systemPrompt, buildUserMessage(files, decisionContext), this.maxTokens(opts.focusCount));
    return { findings: parseFindingsResponse(result.text, opts.defaultFocus), usage: result.usage };
  }
}
