import * as assert from 'assert';
import path from 'node:path';
import { findingLocation, focusDisplay, formatNotification, generateReport, reportPath } from '../audit/report.js';
import { findingsToSarif } from '../audit/sarif.js';
import type { AuditResult } from '../audit/types.js';
import { finding } from './helpers.js';

const high = finding('h1', {
  severity: 'high',
  line: 12,
  title: 'SQL injection',
  description: 'Built by concatenation',
  suggestion: 'Use parameters',
  focus: 'security',
});
const low = finding('l1', { severity: 'low', file: 'src/log.py', title: 'Verbose logging', description: 'Logs secrets' });

const result: AuditResult = {
  repo: 'app',
  focus: 'security',
  provider: 'anthropic',
  findings: [high, low],
  newFindings: [high, low],
  resolvedCount: 1,
  timestamp: '2026-03-16T09:00:00.000Z',
};

suite('Reports', () => {
  test('focus labels and locations read naturally', () => {
    assert.strictEqual(focusDisplay('security+docs'), 'Security + Docs');
    assert.strictEqual(findingLocation(high), 'src/app.py:12');
    assert.strictEqual(findingLocation(low), 'src/log.py');
  });

  test('markdown groups new findings by severity', () => {
    const lines = generateReport(result).split('\n');

    assert.strictEqual(lines[0], '# Audit Report: Security');
    assert.ok(lines.includes('- **New findings**: 2'));
    assert.ok(lines.includes('- **Previously resolved**: 1'));
    assert.ok(lines.includes('**Location**: `src/app.py:12`  '));
    assert.ok(lines.includes('**Suggestion**: Use parameters'));
    assert.ok(lines.indexOf('## 🔴 HIGH (1)') < lines.indexOf('## 🔵 LOW (1)'));
    assert.strictEqual(
      lines.filter((l) => l.startsWith('## 🟡')).length,
      0
    );
  });

  test('a clean run says so', () => {
    const report = generateReport({ ...result, newFindings: [] });
    assert.ok(report.endsWith('No new findings.\n'));
  });

  test('reports are filed per repo and day', () => {
    assert.strictEqual(
      reportPath('/reports', 'app', 'security+docs', 'md', new Date(2026, 2, 16)),
      path.join('/reports', 'app', '2026-03-16-security+docs.md')
    );
  });

  test('notification summarises counts and the first findings', () => {
    assert.strictEqual(
      formatNotification(result),
      [
        '🔒 Security Audit: app',
        '2 new findings: 🔴 1 high, 🔵 1 low',
        '',
        '🔴 SQL injection',
        '   src/app.py',
        '🔵 Verbose logging',
        '   src/log.py',
        '',
        '✅ 1 previous findings still resolved',
      ].join('\n')
    );
  });

  suite('SARIF', () => {
    test('one rule per focus, levels by severity, stable fingerprints', () => {
      const sarif = findingsToSarif([high, low], 'security', 'app');
      const [run] = sarif.runs;

      assert.strictEqual(sarif.version, '2.1.0');
      assert.deepStrictEqual(
        run.tool.driver.rules.map((r) => r.id),
        ['codesweep/security']
      );
      assert.deepStrictEqual(run.results[0], {
        ruleId: 'codesweep/security',
        level: 'error',
        message: { text: 'SQL injection: Built by concatenation' },
        locations: [
          { physicalLocation: { artifactLocation: { uri: 'src/app.py', uriBaseId: '%SRCROOT%' }, region: { startLine: 12 } } },
        ],
        fingerprints: { codesweepFindingId: 'h1' },
        fixes: [
          {
            description: { text: 'Use parameters' },
            artifactChanges: [
              {
                artifactLocation: { uri: 'src/app.py', uriBaseId: '%SRCROOT%' },
                replacements: [{ deletedRegion: { startLine: 12 }, insertedContent: { text: 'Use parameters' } }],
              },
            ],
          },
        ],
      });
      assert.strictEqual(run.results[1].level, 'note');
      assert.strictEqual(run.results[1].fixes, undefined);
      assert.deepStrictEqual(run.properties, { repo: 'app', focus: 'security' });
    });

    test('untagged findings of a combined run fall under general', () => {
      const [run] = findingsToSarif([high, low], 'security+docs', 'app').runs;

      assert.deepStrictEqual(
        run.tool.driver.rules.map((r) => r.id),
        ['codesweep/general', 'codesweep/security']
      );
      assert.strictEqual(run.results[1].ruleId, 'codesweep/general');
    });

    test('an empty run still declares its focus rules', () => {
      const [run] = findingsToSarif([], 'security+docs', 'app').runs;

      assert.deepStrictEqual(
        run.tool.driver.rules.map((r) => r.id),
        ['codesweep/docs', 'codesweep/security']
      );
      assert.deepStrictEqual(run.results, []);
    });
  });
});
