import * as assert from 'assert';
import { buildEstimateReport, countWeeklyRuns, estimatePrepassReduction, frameLabel } from '../audit/estimate.js';
import type { FileContent } from '../audit/types.js';
import { DEFAULT_SCHEDULE } from '../config.js';

function sizedFiles(sizes: number[]): FileContent[] {
  return sizes.map((size, i) => ({ path: `src/f${i}.ts`, content: 'x'.repeat(size) }));
}

function assertClose(actual: number, expected: number) {
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);
}

suite('Cost estimate', () => {
  test('pre-pass reduction keeps the smallest files', () => {
    const files = sizedFiles([1, 2, 3, 4, 5, 6, 7, 8, 9, 10].map((i) => 400 * i));
    const reduction = estimatePrepassReduction(files);

    assert.strictEqual(reduction.high, 2);
    assert.strictEqual(reduction.medium, 3);
    assert.strictEqual(reduction.lowOrSkip, 5);
    assert.strictEqual(reduction.reducedTokens, 1500);
    assertClose(reduction.triageCostUsd, 0.00315);
  });

  test('nothing to reduce in an empty selection', () => {
    assert.deepStrictEqual(estimatePrepassReduction([]), {
      reducedTokens: 0,
      triageCostUsd: 0,
      high: 0,
      medium: 0,
      lowOrSkip: 0,
    });
  });

  test('weekly runs skip off days', () => {
    assert.strictEqual(countWeeklyRuns(DEFAULT_SCHEDULE), 6);
    assert.strictEqual(countWeeklyRuns({ monday: 'security', tuesday: false, wednesday: [] }), 1);
  });

  test('frame label needs one shared frame', () => {
    assert.strictEqual(frameLabel(['security', 'testing']), 'Does it work?');
    assert.strictEqual(frameLabel(['docs']), 'Does it last?');
    assert.strictEqual(frameLabel(['security', 'docs']), undefined);
  });

  test('report for a small selection', () => {
    const lines = buildEstimateReport({
      repo: 'demo',
      focusNames: ['security'],
      files: sizedFiles([8000]),
      provider: 'anthropic',
      modelKey: 'claude-sonnet-4-5',
      schedule: DEFAULT_SCHEDULE,
    }).split('\n');

    assert.ok(lines.includes('  demo: security (Does it work?)'));
    assert.ok(lines.includes('  Files:     1 files, 2.0K tokens'));
    assert.ok(lines.includes('  Provider:  anthropic (claude-sonnet-4-5)'));
    assert.ok(lines.includes('    Batch discount of 50% applied.'));
    assert.ok(lines.includes('  Monthly estimate: ~$0.12 (6 runs/week at current schedule)'));
    assert.ok(lines.includes('  Monthly with gemini-2.0-flash: ~$0.01'));
    assert.ok(!lines.includes('  Pre-pass estimate:'));
  });

  test('a selection over the pricing tier suggests a pre-pass', () => {
    const lines = buildEstimateReport({
      repo: 'demo',
      focusNames: ['security'],
      files: sizedFiles(Array.from({ length: 10 }, () => 100_000)),
      provider: 'anthropic',
      modelKey: 'claude-sonnet-4-5',
      schedule: DEFAULT_SCHEDULE,
    }).split('\n');

    assert.ok(lines.includes('  ! Cost estimate: ~$0.63'));
    assert.ok(lines.includes('    250.0K tokens exceed the 200.0K standard tier.'));
    assert.ok(lines.includes('    Tiered pricing applies: $6.00/M input.'));
    assert.ok(lines.includes('  Pre-pass estimate:'));
    assert.ok(
      lines.includes('    Expected reduction: 250.0K -> ~125.0K tokens (high: 2 files, medium: 3, low/skip: 5)')
    );
  });
});
