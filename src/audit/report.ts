import fs from 'node:fs';
import path from 'node:path';
import { isoDate } from '../memory/decisions.js';
import { SEVERITIES, type AuditResult, type Finding, type Severity } from './types.js';

const SEVERITY_ICONS: Record<Severity, string> = { high: '🔴', medium: '🟡', low: '🔵' };

const FOCUS_ICONS: Record<string, string> = {
  security: '🔒',
  docs: '📝',
  patterns: '🏗️',
  testing: '🧪',
  performance: '⚡',
  hygiene: '🧹',
  dependencies: '📦',
};

/** "security+docs" -> "Security + Docs" */
export function focusDisplay(focus: string): string {
  return focus
    .split('+')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' + ');
}

export function findingLocation(f: Finding): string {
  return f.line ? `${f.file}:${f.line}` : f.file;
}

function toMarkdownFinding(f: Finding): string {
  const lines: string[] = [];
  lines.push(`### ${f.title}`);
  lines.push('');
  lines.push(`**Location**: \`${findingLocation(f)}\`  `);
  lines.push(`**ID**: \`${f.id}\``);
  lines.push('');
  lines.push(f.description);
  if (f.suggestion) {
    lines.push('');
    lines.push(`**Suggestion**: ${f.suggestion}`);
  }
  lines.push('');
  return lines.join('\n');
}

export function generateReport(result: AuditResult): string {
  const lines: string[] = [];
  lines.push(`# Audit Report: ${focusDisplay(result.focus)}`);
  lines.push('');
  lines.push(`- **Repo**: ${result.repo}`);
  lines.push(`- **Focus**: ${focusDisplay(result.focus)}`);
  lines.push(`- **Provider**: ${result.provider}`);
  lines.push(`- **Date**: ${result.timestamp}`);
  lines.push('');
  lines.push('## Summary');
  lines.push('');
  lines.push(`- **New findings**: ${result.newFindings.length}`);
  lines.push(`- **Total findings**: ${result.findings.length}`);
  lines.push(`- **Previously resolved**: ${result.resolvedCount}`);
  lines.push('');

  if (!result.newFindings.length) {
    lines.push('No new findings.');
    lines.push('');
    return lines.join('\n');
  }

  for (const severity of SEVERITIES) {
    const group = result.newFindings.filter((f) => f.severity === severity);
    if (!group.length) continue;
    lines.push(`## ${SEVERITY_ICONS[severity]} ${severity.toUpperCase()} (${group.length})`);
    lines.push('');
    for (const f of group) lines.push(toMarkdownFinding(f));
  }

  return lines.join('\n');
}

/** `<reportsDir>/<repo>/<YYYY-MM-DD>-<focus>.<ext>` */
export function reportPath(reportsDir: string, repo: string, focus: string, ext: 'md' | 'sarif', now: Date = new Date()): string {
  return path.join(reportsDir, repo, `${isoDate(now)}-${focus}.${ext}`);
}

export function saveReport(report: string, reportsDir: string, repo: string, focus: string, now: Date = new Date()): string {
  const file = reportPath(reportsDir, repo, focus, 'md', now);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, report, 'utf8');
  return file;
}

/** Short chat message: counts per severity and the first three findings. */
export function formatNotification(result: AuditResult): string {
  const icon = FOCUS_ICONS[result.focus] ?? '🔍';
  const lines = [`${icon} ${focusDisplay(result.focus)} Audit: ${result.repo}`];

  if (!result.newFindings.length) {
    lines.push('✅ No new findings');
  } else {
    const parts = SEVERITIES.map((s) => {
      const n = result.newFindings.filter((f) => f.severity === s).length;
      return n ? `${SEVERITY_ICONS[s]} ${n} ${s}` : '';
    }).filter(Boolean);
    lines.push(`${result.newFindings.length} new findings: ${parts.join(', ')}`);
    lines.push('');
    for (const f of result.newFindings.slice(0, 3)) {
      lines.push(`${SEVERITY_ICONS[f.severity]} ${f.title}`);
      lines.push(`   ${f.file}`);
    }
  }

  if (result.resolvedCount) {
    lines.push('');
    lines.push(`✅ ${result.resolvedCount} previous findings still resolved`);
  }

  return lines.join('\n');
}
