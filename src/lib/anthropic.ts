import { z } from 'zod';
import { parseFindingsResponse } from '../audit/parsing.js';
import { buildUserMessage } from '../audit/prompt.js';
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

const BATCHES_URL = 'https://api.anthropic.com/v1/messages/batches';
const API_VERSION = '2023-06-01';

const batchSchema = z.object({
  id: z.string(),
  processing_status: z.enum(['in_progress', 'canceling', 'ended']),
  request_counts: z.object({
    processing: z.number(),
    succeeded: z.number(),
    errored: z.number(),
  }),
  results_url: z.string().nullish(),
});

const resultLineSchema = z.object({
  custom_id: z.string(),
  result: z.union([
    z.object({
      type: z.literal('succeeded'),
      message: z.object({
        content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
        usage: z.object({
          input_tokens: z.number(),
          output_tokens: z.number(),
          cache_read_input_tokens: z.number().nullish(),
          cache_creation_input_tokens: z.number().nullish(),
        }),
      }),
    }),
    z.object({ type: z.enum(['errored', 'canceled', 'expired']) }),
  ]),
});

/** custom_id must match ^[a-zA-Z0-9_-]{1,64}$. */
export function toCustomId(label: string): string {
  return label.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 64) || 'codesweep-audit';
}

/** Anthropic Message Batches: one request per job, results fetched from results_url. */
export class AnthropicProvider extends BaseProvider {
  readonly name = 'anthropic' as const;
  readonly batchDiscount = true;
  private readonly apiKey: string;

  constructor(settings: ProviderSettings) {
    super(settings);
    this.apiKey = requireApiKey(settings.apiKey, 'ANTHROPIC_API_KEY');
  }

  private headers(): Record<string, string> {
    return {
      'x-api-key': this.apiKey,
      'anthropic-version': API_VERSION,
      'content-type': 'application/json',
    };
  }

  async submit(
    files: FileContent[],
    systemPrompt: string,
    decisionContext: string,
    jobLabel: string,
    opts: SubmitOptions = {}
  ): Promise<string> {
    const body = {
      requests: [
        {
          custom_id: toCustomId(jobLabel),
          params: {
            model: this.model,
            max_tokens: this.maxTokens(opts.focusCount),
            system: systemPrompt,
            messages: [{ role: 'user', content: buildUserMessage(files, decisionContext) }],
          },
        },
      ],
    };

    const data = await fetchJson({
      label: 'Anthropic',
      url: BATCHES_URL,
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify(body),
      ...this.retry(),
    });
    return parseWire(batchSchema, data, 'Anthropic batch create').id;
  }

  async poll(jobId: string, opts: PollOptions = {}): Promise<PollResult> {
    const data = await fetchJson({
      label: 'Anthropic',
      url: `${BATCHES_URL}/${encodeURIComponent(jobId)}`,
      headers: this.headers(),
      ...this.retry(),
    });
    const batch = parseWire(batchSchema, data, 'Anthropic batch status');

    if (batch.processing_status !== 'ended') {
      return { status: 'processing', processing: batch.request_counts.processing };
    }
    if (!batch.results_url) {
      return { status: 'ended', outcome: 'errored', findings: [], usage: emptyUsage() };
    }

    const text = await fetchText({ label: 'Anthropic', url: batch.results_url, headers: this.headers(), ...this.retry() });

    let findings: Finding[] = [];
    let usage: TokenUsage = emptyUsage();
    let succeeded = false;

    for (const line of parseJsonLines(text, 'Anthropic')) {
      const entry = parseWire(resultLineSchema, line, 'Anthropic batch result');
      if (entry.result.type !== 'succeeded') continue;

      const { message } = entry.result;
      const responseText = message.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join('');
      findings = findings.concat(parseFindingsResponse(responseText, opts.defaultFocus));
      usage = {
        inputTokens: usage.inputTokens + message.usage.input_tokens,
        outputTokens: usage.outputTokens + message.usage.output_tokens,
        cacheReadTokens: usage.cacheReadTokens + (message.usage.cache_read_input_tokens ?? 0),
        cacheWriteTokens: usage.cacheWriteTokens + (message.usage.cache_creation_input_tokens ?? 0),
      };
      succeeded = true;
    }

    return { status: 'ended', outcome: succeeded ? 'succeeded' : 'errored', findings, usage };
  }
}
