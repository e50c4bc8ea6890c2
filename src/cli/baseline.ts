#!/usr/bin/env node
import { statePaths, loadAllSnapshots, loadFindingsSnapshot, type FindingsSnapshot } from '../audit/state.js';
import { SEVERITIES, type Severity } from '../audit/types.js';
import { loadConfig, type AuditConfig } from '../config.js';
import { ConfigError } from '../lib/errors.js';
import {
  createBaselineDecisions,
  listBaselineDecisions,
  removeBaselineDecisions,
  saveDecision,
} from '../memory/decisions.js';
import type { BaselineFilter } from '../memory/types.js';
import { getArg, hasFlag, parseCsvList } from './args.js';

function parseSeverities(s: string | undefined): Severity[] {
  return parseCsvList(s).map((raw) => {
    const sev = SEVERITIES.find((x) => x === raw.toLowerCase());
    if (!sev) throw new ConfigError(`Unknown severity: ${raw}`);
    return sev;
  });
}

function snapshotsFor(config: AuditConfig, repo: string | undefined): FindingsSnapshot[] {
  const dir = statePaths(config.stateDir).snapshotDir;
  if (!repo) return loadAllSnapshots(dir);
  const snapshot = loadFindingsSnapshot(dir, repo);
  return snapshot ? [snapshot] : [];
}

async function main() {
  const config = loadConfig(getArg('config'));
  const storePath = config.decisions.path;
  const filter: BaselineFilter = {
    repo: getArg('repo'),
    focus: parseCsvList(getArg('focus')),
    severity: parseSeverities(getArg('severity')),
  };

  if (hasFlag('list')) {
    const baselines = listBaselineDecisions(storePath, filter);
    if (!baselines.length) {
      console.log('No baselined findings.');
      return;
    }
    for (const d of baselines) {
      console.log(`  ${d.finding_id}  ${d.severity ?? '-'}  ${d.focus ?? '-'}  ${d.repo ?? '-'}  ${d.file ?? ''}`);
    }
    console.log(`${baselines.length} baselined finding(s).`);
    return;
  }

  if (hasFlag('undo')) {
    const removed = removeBaselineDecisions(storePath, filter);
    console.log(`Removed ${removed} baseline decisions${filter.repo ? ` for ${filter.repo}` : ''}.`);
    return;
  }

  const snapshots = snapshotsFor(config, filter.repo);
  let created = 0;
  for (const snapshot of snapshots) {
    const findings = snapshot.findings.filter(
      (f) =>
        (!filter.focus?.length || (f.focus !== undefined && filter.focus.includes(f.focus))) &&
        (!filter.severity?.length || filter.severity.includes(f.severity))
    );
    if (!findings.length) continue;

    const repoRoot = config.repos.find((r) => r.name === snapshot.repo)?.path ?? '.';
    for (const decision of createBaselineDecisions(findings, repoRoot, { repo: snapshot.repo })) {
      saveDecision(storePath, decision);
      created++;
    }
  }

  if (!created) {
    const hint = filter.repo ? `codesweep run --repo ${filter.repo}` : 'codesweep run';
    console.log(`No findings to baseline. Run \`${hint}\` first.`);
    return;
  }

  console.log(`Baselined ${created} findings from the latest audit.`);
  console.log('These will not appear in future reports unless the affected files change.');
  console.log('Run `codesweep-baseline --undo` to reverse.');
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
