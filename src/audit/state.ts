import fs from 'node:fs';
import path from 'node:path';
import * as core from '@actions/core';
import { z } from 'zod';
import { describeZodError, errorMessage } from '../lib/errors.js';
import { readJsonFile, removeFile, writeJsonFile } from '../storage/json.js';
import { rawFindingSchema } from './schema.js';
import type { AuditResult, Finding, PendingBatch } from './types.js';

export type StatePaths = {
  pendingBatch: string;
  retrievalMarker: string;
  snapshotDir: string;
  ledger: string;
};

export function statePaths(stateDir: string): StatePaths {
  return {
    pendingBatch: path.join(stateDir, 'pending-batch.json'),
    retrievalMarker: path.join(stateDir, 'last-retrieved.json'),
    snapshotDir: path.join(stateDir, 'latest-findings'),
    ledger: path.join(stateDir, 'cost-ledger.jsonl'),
  };
}

const pendingBatchSchema = z.object({
  submitted_at: z.string(),
  focus: z.string(),
  focus_names: z.array(z.string()).default([]),
  all_batch_ids: z.array(z.string()).default([]),
  batches: z.array(
    z.object({
      repo: z.string(),
      batch_id: z.string(),
      provider: z.string(),
      file_count: z.number().int().nonnegative().default(0),
    })
  ),
});

const retrievalMarkerSchema = z.object({
  batch_ids: z.array(z.string()),
  retrieved_at: z.string(),
});

const snapshotFindingSchema = rawFindingSchema.extend({ id: z.string() });

const snapshotSchema = z.object({
  repo: z.string(),
  focus: z.string(),
  provider: z.string(),
  timestamp: z.string(),
  resolved_count: z.number(),
  total_count: z.number(),
  findings: z.array(snapshotFindingSchema),
});

export type FindingsSnapshot = {
  repo: string;
  focus: string;
  provider: string;
  timestamp: string;
  resolved_count: number;
  total_count: number;
  findings: Finding[];
};

export function loadPendingBatch(filePath: string): PendingBatch | undefined {
  const raw = readJsonFile(filePath);
  if (raw === undefined) return undefined;
  const parsed = pendingBatchSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`Invalid pending batch file ${filePath}: ${describeZodError(parsed.error)}`);
  return parsed.data;
}

export function savePendingBatch(filePath: string, pending: PendingBatch): void {
  writeJsonFile(filePath, pending);
}

export function clearPendingBatch(filePath: string): void {
  removeFile(filePath);
}

/** Job ids the marker records as already retrieved; an unreadable marker records none. */
export function retrievedBatchIds(markerPath: string): Set<string> {
  let raw: unknown;
  try {
    raw = readJsonFile(markerPath);
  } catch (err) {
    core.warning(`Ignoring unreadable retrieval marker ${markerPath}: ${errorMessage(err)}`);
    return new Set();
  }
  const parsed = retrievalMarkerSchema.safeParse(raw);
  return new Set(parsed.success ? parsed.data.batch_ids : []);
}

export function markRetrieved(markerPath: string, batchIds: string[], now: Date = new Date()): void {
  writeJsonFile(markerPath, { batch_ids: batchIds, retrieved_at: now.toISOString() });
}

function snapshotFile(dir: string, repo: string): string {
  return path.join(dir, `${repo.replace(/[^A-Za-z0-9._-]/g, '_')}.json`);
}

/** Overwrites the repo's snapshot with the new findings of this run. */
export function saveFindingsSnapshot(dir: string, result: AuditResult): string {
  const file = snapshotFile(dir, result.repo);
  const snapshot: FindingsSnapshot = {
    repo: result.repo,
    focus: result.focus,
    provider: result.provider,
    timestamp: result.timestamp,
    resolved_count: result.resolvedCount,
    total_count: result.findings.length,
    findings: result.newFindings,
  };
  writeJsonFile(file, snapshot);
  return file;
}

function toSnapshot(raw: unknown, source: string): FindingsSnapshot {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`Invalid findings snapshot ${source}: ${describeZodError(parsed.error)}`);
  const { findings, ...rest } = parsed.data;
  return {
    ...rest,
    findings: findings.map((f) => {
      const finding: Finding = { id: f.id, severity: f.severity, file: f.file, title: f.title, description: f.description };
      if (f.line !== undefined && f.line !== null) finding.line = f.line;
      if (f.suggestion) finding.suggestion = f.suggestion;
      if (f.focus) finding.focus = f.focus;
      return finding;
    }),
  };
}

export function loadFindingsSnapshot(dir: string, repo: string): FindingsSnapshot | undefined {
  const file = snapshotFile(dir, repo);
  const raw = readJsonFile(file);
  return raw === undefined ? undefined : toSnapshot(raw, file);
}

export function loadAllSnapshots(dir: string): FindingsSnapshot[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((name) => name.endsWith('.json'))
    .sort()
    .map((name) => {
      const file = path.join(dir, name);
      return toSnapshot(readJsonFile(file), file);
    });
}
