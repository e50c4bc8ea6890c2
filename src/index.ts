import * as core from '@actions/core';

import { AuditOrchestrator } from './audit/orchestrator.js';
import { createPublisher, type OutputFormat } from './audit/publish.js';
import type { AuditResult } from './audit/types.js';
import { loadConfig } from './config.js';
import { ConfigError, errorMessage } from './lib/errors.js';

function outputFormat(raw: string): OutputFormat {
  const format = raw || 'markdown';
  if (format !== 'markdown' && format !== 'sarif') throw new ConfigError(`Unknown format input: ${format}`);
  return format;
}

async function run() {
  const command = core.getInput('command') || 'run';
  const config = loadConfig(core.getInput('config') || undefined);
  const format = outputFormat(core.getInput('format'));
  const request = {
    repo: core.getInput('repo') || undefined,
    focus: core.getInput('focus') || undefined,
    provider: core.getInput('provider') || undefined,
    dryRun: (core.getInput('dry_run') || 'false').toLowerCase() === 'true',
  };

  const orchestrator = new AuditOrchestrator(config, { onResult: createPublisher(config, { format }) });
  let results: AuditResult[] = [];

  switch (command) {
    case 'run':
      results = await orchestrator.runToCompletion(request);
      break;
    case 'submit': {
      const pending = await orchestrator.submit(request);
      core.setOutput('submitted_jobs', String(pending?.batches.length ?? 0));
      if (!pending) core.info('Nothing submitted.');
      return;
    }
    case 'retrieve': {
      const outcome = await orchestrator.retrieve();
      results = outcome.results;
      core.setOutput('pending_jobs', String(outcome.pending.length));
      if (outcome.failed.length) {
        core.setFailed(outcome.failed.map((f) => `${f.repo}: job ${f.batchId}: ${f.error}`).join('\n'));
      }
      break;
    }
    default:
      throw new ConfigError(`Unknown command input: ${command}`);
  }

  const newFindings = results.reduce((n, r) => n + r.newFindings.length, 0);
  const resolved = results.reduce((n, r) => n + r.resolvedCount, 0);
  core.setOutput('new_findings', String(newFindings));
  core.setOutput('resolved_findings', String(resolved));
  core.setOutput('reports_dir', config.reportsDir);

  await core.summary
    .addHeading('codesweep')
    .addTable([
      [
        { data: 'Repository', header: true },
        { data: 'Focus', header: true },
        { data: 'Provider', header: true },
        { data: 'New', header: true },
        { data: 'Resolved', header: true },
      ],
      ...results.map((r) => [r.repo, r.focus, r.provider, String(r.newFindings.length), String(r.resolvedCount)]),
    ])
    .addRaw(`\nReports written to: ${config.reportsDir}\n`)
    .write();
}

run().catch((err) => {
  core.setFailed(err instanceof Error && err.stack ? err.stack : errorMessage(err));
});
