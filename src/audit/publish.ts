import * as core from '@actions/core';
import type { AuditConfig, RepoConfig } from '../config.js';
import { createGithubIssueTracker, fileIssues, type IssueTracker } from '../integrations/issues.js';
import { sendTelegram } from '../integrations/telegram.js';
import { formatNotification, generateReport, saveReport } from './report.js';
import { findingsToSarif, saveSarif } from './sarif.js';
import type { AuditResult } from './types.js';

export type OutputFormat = 'markdown' | 'sarif';

/** Called once per finished repository audit, after the snapshot is written. */
export type ResultHandler = (result: AuditResult, repo: RepoConfig) => Promise<void>;

export type PublisherOptions = {
  format?: OutputFormat;
  /** Issue tracker override; by default one is built from GITHUB_TOKEN. */
  issueTracker?: IssueTracker;
  notify?: (message: string, target: string) => Promise<boolean>;
  /** Pause between created issues. */
  issueDelayMs?: number;
  now?: () => Date;
};

function defaultIssueTracker(config: AuditConfig): IssueTracker | undefined {
  const token = process.env.GITHUB_TOKEN;
  const repository = config.issues.repository ?? process.env.GITHUB_REPOSITORY;
  if (!token || !repository) return undefined;
  return createGithubIssueTracker(token, repository);
}

/** Report, optional SARIF, chat notification and issue filing for each result. */
export function createPublisher(config: AuditConfig, opts: PublisherOptions = {}): ResultHandler {
  const now = opts.now ?? (() => new Date());
  const notify = opts.notify ?? ((message, target) => sendTelegram(message, { chatId: target }));

  return async (result) => {
    const reportFile = saveReport(generateReport(result), config.reportsDir, result.repo, result.focus, now());
    core.info(`[${result.repo}] Report saved: ${reportFile}`);

    if (opts.format === 'sarif') {
      const sarifFile = saveSarif(findingsToSarif(result.newFindings, result.focus, result.repo), config.reportsDir, result.repo, result.focus, now());
      core.info(`[${result.repo}] SARIF saved: ${sarifFile}`);
    }

    for (const channel of config.notifications) {
      if (channel.channel === 'telegram') await notify(formatNotification(result), channel.target);
    }

    if (config.issues.enabled) {
      const tracker = opts.issueTracker ?? defaultIssueTracker(config);
      if (!tracker) {
        core.warning(`[${result.repo}] Issue filing enabled but GITHUB_TOKEN or the target repository is missing`);
        return;
      }
      await fileIssues(result, config.issues, tracker, opts.issueDelayMs);
    }
  };
}
