import { z } from 'zod';
import { parseFindingsResponse } from '../audit/parsing.js';
import { buildUserMessage } from '../audit/prompt.js';
import { FINDINGS_JSON_SCHEMA } from '../audit/schema.js';
import type { FileContent, Finding, TokenUsage } from '../audit/types.js';
import { emptyUsage } from '../audit/types.js';
import { fetchJson, fetchText } from './http.js';
import {
  BaseProvider,
  parseJsonLines,
  parseWire,
  requireApiKey,
  type PollOptions,
  type PollResult,
  type ProviderSettings,
  type SubmitOptions,
} from './provider.js';

const API_BASE = 'https://api.openai.com/v1';
const ENDPOINT = '/v1/chat/completions';

const TERMINAL_STATUSES = new Set(['completed', 'failed', 'expired', 'cancelled']);

const fileSchema = z.object({ id: z.string() });

const batchSchema = z.object({
  id: z.string(),
  status: z.string(),
  output_file_id: z.string().nullish(),
  request_counts: z
    .object({
      total: z.number(),
      completed: z.number(),
      failed: z.number(),
    })
    .nullish(),
});

const outputLineSchema = z.object({
  custom_id: z.string(),
  response: z
    .object({
      status_code: z.number(),
      body: z.object({
        choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }) })).default([]),
        usage: z
          .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            prompt_tokens_details: z.object({ cached_tokens: z.number().nullish() }).nullish(),
          })
          .nullish(),
      }),
    })
    .nullish(),
});

/** OpenAI Batch API over chat completions with a 24h completion window. */
export class OpenAIProvider extends BaseProvider {
  readonly name = 'openai' as const;
  readonly batchDiscount = true;
  private readonly apiKey: string;

  constructor(settings: ProviderSettings) {
    super(settings);
    this.apiKey = requireApiKey(settings.apiKey, 'OPENAI_API_KEY');
  }

  async submit(
    files: FileContent[],
    systemPrompt: string,
    decisionContext: string,
    jobLabel: string,
    opts: SubmitOptions = {}
  ): Promise<string> {
    const request = {
      custom_id: jobLabel,
      method: 'POST',
      url: ENDPOINT,
      body: {
        model: this.model,
        max_completion_tokens: this.maxTokens(opts.focusCount),
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: buildUserMessage(files, decisionContext) },
        ],
        response_format: {
          type: 'json_schema',
          json_schema: { name: 'audit_findings', schema: FINDINGS_JSON_SCHEMA },
        },
      },
    };

    const form = new FormData();
    form.append('purpose', 'batch');
    form.append('file', new Blob([JSON.stringify(request) + '\n'], { type: 'application/jsonl' }), 'batch.jsonl');

    const uploaded = parseWire(
      fileSchema,
      await fetchJson({
        label: 'OpenAI',
        url: `${API_BASE}/files`,
        method: 'POST',
        headers: { Authorization: `Bearer ${this.apiKey}` },
        body: form,
        ...this.retry(),
      }),
      'OpenAI file upload'
    );

    const batch = parseWire(
      batchSchema,
      await fetchJson({
        label: 'OpenAI',
        url: `${API_BASE}/batches`,
        method: 'POST',
        headers: { Authorization: `Bearer ${this.apiKey}`, 'Content-Type': 'application/json' },
        body: JSON.stringify({ input_file_id: uploaded.id, endpoint: ENDPOINT, completion_window: '24h' }),
        ...this.retry(),
      }),
      'OpenAI batch create'
    );
    return batch.id;
  }

  async poll(jobId: string, opts: PollOptions = {}): Promise<PollResult> {
    const headers = { Authorization: `Bearer ${this.apiKey}` };
    const batch = parseWire(
      batchSchema,
      await fetchJson({ label: 'OpenAI', url: `${API_BASE}/batches/${encodeURIComponent(jobId)}`, headers, ...this.retry() }),
      'OpenAI batch status'
    );

    if (!TERMINAL_STATUSES.has(batch.status)) {
      const counts = batch.request_counts;
      const processing = counts ? Math.max(0, counts.total - counts.completed - counts.failed) : 1;
      return { status: 'processing', processing };
    }
    if (batch.status !== 'completed' || !batch.output_file_id) {
      return { status: 'ended', outcome: 'errored', findings: [], usage: emptyUsage() };
    }

    const text = await fetchText({
      label: 'OpenAI',
      url: `${API_BASE}/files/${encodeURIComponent(batch.output_file_id)}/content`,
      headers,
      ...this.retry(),
    });

    let findings: Finding[] = [];
    let usage: TokenUsage = emptyUsage();
    let succeeded = false;

    for (const line of parseJsonLines(text, 'OpenAI')) {
      const entry = parseWire(outputLineSchema, line, 'OpenAI batch output');
      const response = entry.response;
      if (!response || response.status_code !== 200) continue;

      const content = response.body.choices[0]?.message.content ?? '';
      findings = findings.concat(parseFindingsResponse(content, opts.defaultFocus));

      const u = response.body.usage;
      if (u) {
        // prompt_tokens already includes the cached portion.
        const cached = u.prompt_tokens_details?.cached_tokens ?? 0;
        usage = {
          inputTokens: usage.inputTokens + u.prompt_tokens - cached,
          outputTokens: usage.outputTokens + u.completion_tokens,
          cacheReadTokens: usage.cacheReadTokens + cached,
          cacheWriteTokens: usage.cacheWriteTokens,
        };
      }
      succeeded = true;
    }

    return { status: 'ended', outcome: succeeded ? 'succeeded' : 'errored', findings, usage };
  }
}
