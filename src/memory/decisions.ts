import { createHash } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { Finding } from '../audit/types.js';
import { DecisionStoreError, describeZodError } from '../lib/errors.js';
import { appendJsonl, readJsonl, writeJsonlLines, type JsonlRecord } from '../storage/jsonl.js';
import type { BaselineFilter, Decision } from './types.js';

export const BASELINE_REASON = 'baseline';

const DAY_MS = 86_400_000;

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v || undefined);

const decisionSchema = z.object({
  finding_id: z.string().min(1),
  decision: z.enum(['accepted', 'dismissed', 'intentional']),
  reason: z.string(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}/, 'expected a YYYY-MM-DD date'),
  by: z.string(),
  file: optionalString,
  file_hash: optionalString,
  focus: optionalString,
  severity: z
    .enum(['high', 'medium', 'low'])
    .nullish()
    .transform((v) => v ?? undefined),
  repo: optionalString,
});

function toDecision(record: JsonlRecord, storePath: string): Decision {
  const parsed = decisionSchema.safeParse(record.value);
  if (!parsed.success) {
    throw new DecisionStoreError(
      `Invalid decision record on line ${record.lineNumber} of ${storePath}: ${describeZodError(parsed.error)}`,
      record.lineNumber
    );
  }
  const { file, file_hash, focus, severity, repo, ...required } = parsed.data;
  const decision: Decision = { ...required };
  if (file) decision.file = file;
  if (file_hash) decision.file_hash = file_hash;
  if (focus) decision.focus = focus;
  if (severity) decision.severity = severity;
  if (repo) decision.repo = repo;
  return decision;
}

function readStore(storePath: string): JsonlRecord[] {
  return readJsonl(storePath, (lineNumber) => {
    throw new DecisionStoreError(`Malformed JSON on line ${lineNumber} of ${storePath}`, lineNumber);
  });
}

/** Missing store means no decisions; any corrupt line is fatal. */
export function loadDecisions(storePath: string): Decision[] {
  return readStore(storePath).map((record) => toDecision(record, storePath));
}

export function saveDecision(storePath: string, decision: Decision): void {
  appendJsonl(storePath, decision);
}

/** Effective decision per finding id: greatest date wins, the earlier record on a tie. */
export function latestDecisions(decisions: Decision[]): Map<string, Decision> {
  const latest = new Map<string, Decision>();
  for (const d of decisions) {
    const current = latest.get(d.finding_id);
    if (!current || d.date > current.date) latest.set(d.finding_id, d);
  }
  return latest;
}

/** Local calendar date as YYYY-MM-DD. */
export function isoDate(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const dd = String(d.getDate()).padStart(2, '0');
  return `${d.getFullYear()}-${mm}-${dd}`;
}

function dayNumber(isoDay: string): number {
  const [y, m, d] = isoDay.slice(0, 10).split('-').map(Number);
  return Date.UTC(y, m - 1, d) / DAY_MS;
}

export function isExpired(decisionDate: string, today: Date, expiryDays: number): boolean {
  return dayNumber(isoDate(today)) - dayNumber(decisionDate) > expiryDays;
}

/** First 16 hex chars of the SHA-256 of the file bytes, or undefined when unreadable. */
export function hashFile(filePath: string): string | undefined {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (err) {
    if (isUnreadable(err)) return undefined;
    throw err;
  }
  return createHash('sha256').update(bytes).digest('hex').slice(0, 16);
}

function isUnreadable(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return ['ENOENT', 'EACCES', 'EPERM', 'EISDIR', 'ENOTDIR'].includes(String(err.code));
}

export type FilterResult = {
  newFindings: Finding[];
  resolvedCount: number;
};

/**
 * Drops findings with a live decision. A decision stops suppressing once it is
 * older than `expiryDays` or once the file it was recorded against has changed.
 */
export function filterFindings(
  findings: Finding[],
  decisions: Decision[],
  repoRoot: string,
  expiryDays: number,
  today: Date = new Date()
): FilterResult {
  const latest = latestDecisions(decisions);
  const newFindings: Finding[] = [];
  let resolvedCount = 0;

  for (const finding of findings) {
    const decision = latest.get(finding.id);
    if (!decision || isExpired(decision.date, today, expiryDays)) {
      newFindings.push(finding);
      continue;
    }
    if (decision.file_hash && finding.file) {
      const current = hashFile(path.join(repoRoot, finding.file));
      if (current !== decision.file_hash) {
        newFindings.push(finding);
        continue;
      }
    }
    resolvedCount++;
  }

  return { newFindings, resolvedCount };
}

/** Prompt section listing the effective decision per finding; empty when there are none. */
export function formatDecisionContext(decisions: Decision[]): string {
  if (!decisions.length) return '';
  const effective = [...latestDecisions(decisions).values()];
  const lines = ['## Previously Reviewed Findings', ''];
  lines.push('The following findings were reviewed before. Do not report them again unless the code has changed:');
  lines.push('');
  for (const d of effective) {
    lines.push(`- [${d.decision.toUpperCase()}] finding_id=${d.finding_id}: ${d.reason}`);
  }
  return lines.join('\n');
}

export type BaselineOptions = {
  by?: string;
  repo?: string;
  today?: Date;
};

export function createBaselineDecisions(findings: Finding[], repoRoot: string, opts: BaselineOptions = {}): Decision[] {
  const date = isoDate(opts.today ?? new Date());
  return findings.map((f) => {
    const decision: Decision = {
      finding_id: f.id,
      decision: 'dismissed',
      reason: BASELINE_REASON,
      date,
      by: opts.by ?? 'baseline',
      file: f.file,
      severity: f.severity,
    };
    const fileHash = hashFile(path.join(repoRoot, f.file));
    if (fileHash) decision.file_hash = fileHash;
    if (f.focus) decision.focus = f.focus;
    if (opts.repo) decision.repo = opts.repo;
    return decision;
  });
}

function matchesBaselineFilter(d: Decision, filter: BaselineFilter): boolean {
  if (filter.repo && d.repo !== filter.repo) return false;
  if (filter.focus?.length && !(d.focus && filter.focus.includes(d.focus))) return false;
  if (filter.severity?.length && !(d.severity && filter.severity.includes(d.severity))) return false;
  return true;
}

export function listBaselineDecisions(storePath: string, filter: BaselineFilter = {}): Decision[] {
  return loadDecisions(storePath).filter((d) => d.reason === BASELINE_REASON && matchesBaselineFilter(d, filter));
}

/**
 * Removes baseline records matching every given filter and rewrites the store.
 * All other lines are kept byte-for-byte. Returns the number removed.
 */
export function removeBaselineDecisions(storePath: string, filter: BaselineFilter = {}): number {
  if (!fs.existsSync(storePath)) return 0;

  const kept: string[] = [];
  let removed = 0;
  for (const record of readStore(storePath)) {
    const d = toDecision(record, storePath);
    if (d.reason === BASELINE_REASON && matchesBaselineFilter(d, filter)) {
      removed++;
    } else {
      kept.push(record.raw);
    }
  }

  if (removed > 0) writeJsonlLines(storePath, kept);
  return removed;
}
