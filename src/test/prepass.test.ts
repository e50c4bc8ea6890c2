import * as assert from 'assert';
import { FILE_MAP_HEADER } from '../audit/excerpts.js';
import { classifyFiles, runPrepass, shouldRunPrepass, type PrepassSettings } from '../audit/prepass.js';
import type { FileContent } from '../audit/types.js';
import { FakeProvider, findingsJson } from './fakes.js';

const SETTINGS: PrepassSettings = {
  enabled: false,
  thresholdTokens: 600_000,
  autoDisable: false,
  provider: 'gemini',
  model: 'gemini-2.5-flash',
};

function sized(tokens: number): FileContent[] {
  return [{ path: 'big.ts', content: 'x'.repeat(tokens * 4) }];
}

suite('Pre-pass', () => {
  const files: FileContent[] = [
    { path: 'A.ts', content: 'const a = 1;\n' },
    { path: 'B.ts', content: 'export class B {}\nconst hidden = 2;\n' },
    { path: 'C.ts', content: 'const c = 3;\n' },
  ];

  test('maps relevance to tiers and skips files the classifier left out', async () => {
    const provider = new FakeProvider('gemini', () =>
      findingsJson([
        { severity: 'high', file: 'A.ts', title: 'A.ts' },
        { severity: 'low', file: 'B.ts', title: 'B.ts' },
      ])
    );

    const { classified } = await classifyFiles(files, ['security'], provider);

    assert.deepStrictEqual(
      classified.map((c) => [c.path, c.tier]),
      [
        ['A.ts', 'full'],
        ['B.ts', 'map'],
        ['C.ts', 'skip'],
      ]
    );
    assert.strictEqual(provider.submissions[0].jobLabel, 'codesweep-prepass');
  });

  test('keeps only retained files, excerpted by tier', async () => {
    const provider = new FakeProvider('gemini', () =>
      findingsJson([
        { severity: 'high', file: 'A.ts', title: 'A.ts' },
        { severity: 'low', file: 'B.ts', title: 'B.ts' },
      ])
    );

    const result = await runPrepass(files, ['security'], provider);

    assert.deepStrictEqual(result.files, [
      { path: 'A.ts', content: 'const a = 1;\n' },
      { path: 'B.ts', content: `${FILE_MAP_HEADER}\nexport class B {}` },
    ]);
    assert.strictEqual(result.originalCount, 3);
    assert.strictEqual(result.retainedCount, 2);
    assert.strictEqual(result.usage.inputTokens, 1000);
  });

  test('the first classification for a path wins', async () => {
    const provider = new FakeProvider('gemini', () =>
      findingsJson([
        { severity: 'medium', file: 'A.ts', title: 'first' },
        { severity: 'high', file: 'A.ts', title: 'second' },
      ])
    );

    const { classified } = await classifyFiles([files[0]], ['docs'], provider);

    assert.strictEqual(classified[0].tier, 'snippet');
  });

  test('no files means no classifier call', async () => {
    const provider = new FakeProvider('gemini', () => findingsJson([]));

    const { classified } = await classifyFiles([], ['docs'], provider);

    assert.deepStrictEqual(classified, []);
    assert.strictEqual(provider.submissions.length, 0);
  });

  suite('Trigger', () => {
    test('runs when enabled and over the threshold', () => {
      const settings = { ...SETTINGS, enabled: true, thresholdTokens: 1000 };
      assert.strictEqual(shouldRunPrepass(sized(1001), settings, 'gemini', 'gemini-2.5-flash').run, true);
      assert.strictEqual(shouldRunPrepass(sized(1000), settings, 'gemini', 'gemini-2.5-flash').run, false);
    });

    test('runs automatically when the prompt crosses a pricing tier', () => {
      const decision = shouldRunPrepass(sized(200_001), SETTINGS, 'anthropic', 'claude-sonnet-4-5');
      assert.strictEqual(decision.run, true);
      assert.strictEqual(decision.reason, '~200K tokens would cross the 200K pricing tier of claude-sonnet-4-5');
    });

    test('stays off below the tier and for models without one', () => {
      assert.strictEqual(shouldRunPrepass(sized(200_000), SETTINGS, 'anthropic', 'claude-sonnet-4-5').run, false);
      assert.strictEqual(shouldRunPrepass(sized(900_000), SETTINGS, 'openai', 'gpt-4.1').run, false);
    });

    test('auto_disable turns the tier trigger off', () => {
      const settings = { ...SETTINGS, autoDisable: true };
      assert.strictEqual(shouldRunPrepass(sized(300_000), settings, 'anthropic', 'claude-sonnet-4-5').run, false);
    });
  });
});
