import * as core from '@actions/core';
import * as github from '@actions/github';
import type { AuditConfig } from '../config.js';
import { errorMessage } from '../lib/errors.js';
import { sleep } from '../lib/http.js';
import { findingLocation, focusDisplay } from '../audit/report.js';
import { severityRank, type AuditResult, type Finding, type Severity } from '../audit/types.js';

export type NewIssue = {
  title: string;
  body: string;
  labels: string[];
  assignees: string[];
};

/** The slice of GitHub the filer needs; tests substitute an in-memory tracker. */
export interface IssueTracker {
  hasOpenIssue(marker: string): Promise<boolean>;
  createIssue(issue: NewIssue): Promise<string>;
}

export type IssueSettings = AuditConfig['issues'];

export function findingMarker(id: string): string {
  return `codesweep-finding-id: ${id}`;
}

export function qualifyingFindings(findings: Finding[], threshold: Severity): Finding[] {
  return findings.filter((f) => severityRank(f.severity) >= severityRank(threshold));
}

export function buildIssue(finding: Finding, result: AuditResult, settings: IssueSettings): NewIssue {
  const lines: string[] = [];
  lines.push(`**Severity:** ${finding.severity}`);
  lines.push(`**Location:** \`${findingLocation(finding)}\``);
  lines.push(`**Focus area:** ${focusDisplay(finding.focus ?? result.focus)}`);
  lines.push('');
  lines.push('### Description');
  lines.push(finding.description);
  if (finding.suggestion) {
    lines.push('');
    lines.push('### Suggestion');
    lines.push(finding.suggestion);
  }
  lines.push('');
  lines.push('---');
  lines.push(`*Found by codesweep (${result.provider}, ${result.timestamp})*`);
  lines.push('');
  lines.push(`<!-- ${findingMarker(finding.id)} -->`);

  return {
    title: `[codesweep/${finding.severity}] ${finding.title}`,
    body: lines.join('\n'),
    labels: [...settings.labels, `codesweep:${finding.severity}`],
    assignees: settings.assignees,
  };
}

/**
 * Opens one issue per qualifying new finding unless an open issue already
 * carries its marker. Returns the URLs of the issues created.
 */
export async function fileIssues(
  result: AuditResult,
  settings: IssueSettings,
  tracker: IssueTracker,
  delayMs = 1000
): Promise<string[]> {
  if (!settings.enabled) return [];

  const qualifying = qualifyingFindings(result.newFindings, settings.severityThreshold);
  if (!qualifying.length) return [];

  core.info(`[${result.repo}] Creating issues for ${qualifying.length} findings...`);
  const created: string[] = [];

  for (const [idx, finding] of qualifying.entries()) {
    try {
      if (await tracker.hasOpenIssue(findingMarker(finding.id))) {
        core.info(`[${result.repo}]   Skipping ${finding.id} (issue exists)`);
        continue;
      }
      const url = await tracker.createIssue(buildIssue(finding, result, settings));
      created.push(url);
      core.info(`[${result.repo}]   Created: ${url}`);
    } catch (err) {
      core.warning(`[${result.repo}]   Issue filing failed for ${finding.id}: ${errorMessage(err)}`);
    }

    if (delayMs > 0 && idx < qualifying.length - 1) await sleep(delayMs);
  }

  return created;
}

/** Issue tracker over the GitHub REST API for `owner/name`. */
export function createGithubIssueTracker(token: string, repository: string): IssueTracker {
  const [owner, repo] = repository.split('/');
  const octokit = github.getOctokit(token);

  return {
    async hasOpenIssue(marker) {
      const res = await octokit.request('GET /search/issues', {
        q: `"${marker}" repo:${owner}/${repo} is:issue is:open in:body`,
        per_page: 1,
      });
      return res.data.total_count > 0;
    },
    async createIssue(issue) {
      const res = await octokit.request('POST /repos/{owner}/{repo}/issues', {
        owner,
        repo,
        title: issue.title,
        body: issue.body,
        labels: issue.labels,
        assignees: issue.assignees,
      });
      return res.data.html_url;
    },
  };
}
