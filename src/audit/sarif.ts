import fs from 'node:fs';
import path from 'node:path';
import { reportPath } from './report.js';
import type { Finding, Severity } from './types.js';

export const TOOL_NAME = 'codesweep';
export const TOOL_VERSION = '0.1.0';

const SARIF_SCHEMA = 'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/master/Schemata/sarif-schema-2.1.0.json';

const LEVELS: Record<Severity, 'error' | 'warning' | 'note'> = {
  high: 'error',
  medium: 'warning',
  low: 'note',
};

type ArtifactLocation = { uri: string; uriBaseId: '%SRCROOT%' };

export type SarifResult = {
  ruleId: string;
  level: 'error' | 'warning' | 'note';
  message: { text: string };
  locations: Array<{ physicalLocation: { artifactLocation: ArtifactLocation; region?: { startLine: number } } }>;
  fingerprints: { codesweepFindingId: string };
  fixes?: Array<{
    description: { text: string };
    artifactChanges: Array<{
      artifactLocation: ArtifactLocation;
      replacements: Array<{ deletedRegion: { startLine: number }; insertedContent: { text: string } }>;
    }>;
  }>;
};

export type SarifRule = {
  id: string;
  name: string;
  shortDescription: { text: string };
  defaultConfiguration: { level: 'warning' };
};

export type SarifLog = {
  version: '2.1.0';
  $schema: string;
  runs: Array<{
    tool: { driver: { name: string; version: string; rules: SarifRule[] } };
    results: SarifResult[];
    properties: { repo: string; focus: string };
  }>;
};

function ruleId(focus: string): string {
  return `${TOOL_NAME}/${focus}`;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function toSarifResult(f: Finding, fallbackFocus: string): SarifResult {
  const artifactLocation: ArtifactLocation = { uri: f.file, uriBaseId: '%SRCROOT%' };
  const result: SarifResult = {
    ruleId: ruleId(f.focus ?? fallbackFocus),
    level: LEVELS[f.severity],
    message: { text: f.description ? `${f.title}: ${f.description}` : f.title },
    locations: [{ physicalLocation: f.line ? { artifactLocation, region: { startLine: f.line } } : { artifactLocation } }],
    fingerprints: { codesweepFindingId: f.id },
  };

  if (f.suggestion) {
    result.fixes = [
      {
        description: { text: f.suggestion },
        artifactChanges: [
          {
            artifactLocation,
            replacements: [{ deletedRegion: { startLine: f.line ?? 1 }, insertedContent: { text: f.suggestion } }],
          },
        ],
      },
    ];
  }
  return result;
}

/**
 * One rule per focus the results refer to, or per focus in the label when there
 * are no results. Untagged findings fall under the label's single focus, else `general`.
 */
export function findingsToSarif(findings: Finding[], focus: string, repo: string): SarifLog {
  const labelNames = focus
    .split('+')
    .map((s) => s.trim())
    .filter(Boolean);
  const fallback = labelNames.length === 1 ? labelNames[0] : 'general';
  const ruleNames = new Set(findings.length ? findings.map((f) => f.focus ?? fallback) : labelNames);

  const rules = [...ruleNames].sort().map((name) => ({
    id: ruleId(name),
    name: capitalize(name),
    shortDescription: { text: `${capitalize(name)} audit` },
    defaultConfiguration: { level: 'warning' as const },
  }));

  return {
    version: '2.1.0',
    $schema: SARIF_SCHEMA,
    runs: [
      {
        tool: { driver: { name: TOOL_NAME, version: TOOL_VERSION, rules } },
        results: findings.map((f) => toSarifResult(f, fallback)),
        properties: { repo, focus },
      },
    ],
  };
}

export function saveSarif(sarif: SarifLog, reportsDir: string, repo: string, focus: string, now: Date = new Date()): string {
  const file = reportPath(reportsDir, repo, focus, 'sarif', now);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(sarif, null, 2), 'utf8');
  return file;
}
