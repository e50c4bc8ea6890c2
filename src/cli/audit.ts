#!/usr/bin/env node
import { renderCostSummary, summarizeCosts } from '../audit/cost-summary.js';
import { buildEstimateReport } from '../audit/estimate.js';
import { selectFiles } from '../audit/files.js';
import { focusAreas, getFocusArea, patternsFor } from '../audit/focus.js';
import { CostLedger } from '../audit/ledger.js';
import { FRAME_LABELS, FRAMES, enabledFocusForFrame, normalizeFocus } from '../audit/frames.js';
import { AuditOrchestrator, type AuditRequest } from '../audit/orchestrator.js';
import { resolveModelKey } from '../audit/pricing.js';
import { createPublisher, type OutputFormat } from '../audit/publish.js';
import { TOOL_VERSION } from '../audit/sarif.js';
import { statePaths } from '../audit/state.js';
import type { AuditResult } from '../audit/types.js';
import { loadConfig, providerForRepo, weekdayName, WEEKDAY_NAMES, type AuditConfig } from '../config.js';
import { ConfigError } from '../lib/errors.js';
import { loadDecisions } from '../memory/decisions.js';
import { getArg, hasFlag } from './args.js';

const USAGE = `Usage: codesweep <command> [options]

Commands:
  run        Audit and wait for the results
  submit     Submit audit jobs and record them as pending
  retrieve   Collect finished jobs from the pending batch
  schedule   Show the weekly schedule
  estimate   Estimate the cost of an audit (no API keys needed)
  status     Show configuration, today's focus and recent spend

Options:
  --config <file>       Config file (default: codesweep.yml)
  --repo <name>         Only this repository
  --focus <focus>       Focus name, comma list, frame name or "all"
  --provider <name>     anthropic | openai | gemini
  --format <format>     markdown | sarif
  --pending <file>      Pending batch file for retrieve
  --dry-run             Gather files without calling a provider`;

function auditRequest(): AuditRequest {
  return {
    repo: getArg('repo'),
    focus: getArg('focus'),
    provider: getArg('provider'),
    dryRun: hasFlag('dry-run'),
  };
}

function outputFormat(): OutputFormat {
  const format = getArg('format') ?? 'markdown';
  if (format !== 'markdown' && format !== 'sarif') throw new ConfigError(`Unknown format: ${format}`);
  return format;
}

function printResults(results: AuditResult[]) {
  for (const r of results) {
    console.log(`${r.repo} [${r.focus}] via ${r.provider}: ${r.newFindings.length} new, ${r.resolvedCount} resolved`);
  }
}

function printSchedule(config: AuditConfig, now: Date) {
  const today = weekdayName(now);
  console.log('Weekly schedule:');
  console.log('');
  for (const day of WEEKDAY_NAMES) {
    const raw = config.schedule[day] ?? 'off';
    let display: string;
    let active: boolean;

    if (typeof raw === 'string' && Object.hasOwn(FRAMES, raw)) {
      const focuses = enabledFocusForFrame(raw, config.frames[raw]);
      display = `${FRAME_LABELS[raw]} (${focuses.length ? focuses.join(', ') : 'none active'})`;
      active = focuses.length > 0;
    } else {
      const names = normalizeFocus(raw);
      display = names.length ? names.join(', ') : 'off';
      active = names.length > 0;
    }

    const label = day.charAt(0).toUpperCase() + day.slice(1);
    console.log(`  ${active ? '▶ ' : '  '}${label.padEnd(12)} ${display}${day === today ? '  <- today' : ''}`);
  }
}

function printStatus(config: AuditConfig, orchestrator: AuditOrchestrator) {
  console.log(`codesweep v${TOOL_VERSION}`);
  console.log('');
  console.log('Repos:');
  for (const repo of config.repos) console.log(`  ${repo.name}: ${repo.path} (${repo.providerRotation.join(', ')})`);
  if (!config.repos.length) console.log('  (none configured)');
  console.log('');
  console.log(`Model: ${config.model}`);
  console.log(`Decisions: ${config.decisions.path} (${loadDecisions(config.decisions.path).length} recorded)`);
  console.log(`Reports: ${config.reportsDir}`);
  const today = orchestrator.resolveFocusNames();
  console.log(`Today's focus: ${today.length ? today.join(', ') : 'off'}`);
  console.log('');
  const ledger = new CostLedger(statePaths(config.stateDir).ledger);
  console.log(renderCostSummary(summarizeCosts(ledger.lastNDays(30)), 30));
}

async function estimate(config: AuditConfig, orchestrator: AuditOrchestrator) {
  const req = auditRequest();
  const focusNames = orchestrator.resolveFocusNames(req.focus);
  if (!focusNames.length) {
    console.log('Today is scheduled as off. Use --focus to override.');
    return;
  }

  const repos = req.repo ? config.repos.filter((r) => r.name === req.repo) : config.repos;
  if (req.repo && !repos.length) throw new ConfigError(`Unknown repository: ${req.repo}`);
  if (!repos.length) {
    console.log('No repositories configured. Add repos to codesweep.yml.');
    return;
  }

  const patterns = patternsFor(focusNames.map((n) => getFocusArea(n)));
  for (const repo of repos) {
    const files = await selectFiles(repo.path, patterns, repo.exclude);
    if (!files.length) {
      console.log(`\n  ${repo.name}: No files found matching focus areas.`);
      continue;
    }
    const provider = req.provider ?? providerForRepo(config, repo.name);
    console.log(
      buildEstimateReport({
        repo: repo.name,
        focusNames,
        files,
        provider,
        modelKey: resolveModelKey(provider, orchestrator.modelFor(provider)),
        schedule: config.schedule,
      })
    );
  }
}

async function main() {
  const command = process.argv[2];
  if (!command || command === '--help' || hasFlag('help')) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig(getArg('config'));

  switch (command) {
    case 'run': {
      const orchestrator = new AuditOrchestrator(config, { onResult: createPublisher(config, { format: outputFormat() }) });
      printResults(await orchestrator.runToCompletion(auditRequest()));
      return;
    }
    case 'submit': {
      const pending = await new AuditOrchestrator(config).submit(auditRequest());
      if (!pending) return;
      console.log(`Submitted ${pending.batches.length} job(s) for ${pending.focus}`);
      return;
    }
    case 'retrieve': {
      const orchestrator = new AuditOrchestrator(config, { onResult: createPublisher(config, { format: outputFormat() }) });
      const outcome = await orchestrator.retrieve({ pendingPath: getArg('pending') });
      printResults(outcome.results);
      if (outcome.pending.length && !outcome.skipped) console.log(`${outcome.pending.length} job(s) still pending`);
      for (const f of outcome.failed) console.error(`${f.repo}: job ${f.batchId} failed: ${f.error}`);
      if (outcome.failed.length) process.exitCode = 1;
      return;
    }
    case 'schedule':
      printSchedule(config, new Date());
      console.log('');
      console.log('Focus areas:');
      for (const area of focusAreas().values()) console.log(`  ${area.name}: ${area.description}`);
      return;
    case 'status':
      printStatus(config, new AuditOrchestrator(config));
      return;
    case 'estimate':
      await estimate(config, new AuditOrchestrator(config));
      return;
    default:
      throw new ConfigError(`Unknown command: ${command}\n\n${USAGE}`);
  }
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
