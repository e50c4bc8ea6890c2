import { createHash } from 'node:crypto';
import { describeZodError, ModelOutputError } from '../lib/errors.js';
import { parseJsonPayload } from './json.js';
import { findingsPayloadSchema, type RawFinding } from './schema.js';
import type { Finding } from './types.js';

export type FindingKey = {
  focus?: string;
  file: string;
  title: string;
  line?: number;
};

/** Stable 12-hex id; the focus prefix is only present when a focus is known. */
export function makeFindingId({ focus, file, title, line }: FindingKey): string {
  const base = `${file}:${title}:${line ?? ''}`;
  const key = focus ? `${focus}:${base}` : base;
  return createHash('sha256').update(key, 'utf8').digest('hex').slice(0, 12);
}

function toFinding(raw: RawFinding, defaultFocus?: string): Finding {
  const focus = raw.focus || defaultFocus || undefined;
  const line = raw.line ?? undefined;

  const finding: Finding = {
    id: makeFindingId({ focus, file: raw.file, title: raw.title, line }),
    severity: raw.severity,
    file: raw.file,
    title: raw.title,
    description: raw.description,
  };
  if (line !== undefined) finding.line = line;
  if (raw.suggestion) finding.suggestion = raw.suggestion;
  if (focus) finding.focus = focus;
  return finding;
}

export function parseFindingsResponse(text: string, defaultFocus?: string): Finding[] {
  const payload = parseJsonPayload(text);
  const parsed = findingsPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ModelOutputError(`Model output does not match the findings schema: ${describeZodError(parsed.error)}`);
  }
  return parsed.data.findings.map((raw) => toFinding(raw, defaultFocus));
}
