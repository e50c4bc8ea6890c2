import * as assert from 'assert';
import { allFocusNames, buildCombinedPrompt, focusLabel, getFocusArea, patternsFor } from '../audit/focus.js';
import { enabledFocusForFrame, frameForFocus, normalizeFocus } from '../audit/frames.js';
import { ConfigError } from '../lib/errors.js';

const ALL = ['security', 'docs', 'patterns', 'testing', 'hygiene', 'dependencies', 'performance'];

suite('Focus frames', () => {
  test('normalizes every schedule spelling', () => {
    assert.deepStrictEqual(normalizeFocus('security'), ['security']);
    assert.deepStrictEqual(normalizeFocus('security, docs'), ['security', 'docs']);
    assert.deepStrictEqual(normalizeFocus('does_it_work'), ['security', 'testing']);
    assert.deepStrictEqual(normalizeFocus(['does_it_work', 'docs']), ['security', 'testing', 'docs']);
    assert.deepStrictEqual(normalizeFocus('all'), ALL);
    assert.deepStrictEqual(normalizeFocus(true), ALL);
    assert.deepStrictEqual(normalizeFocus('off'), []);
    assert.deepStrictEqual(normalizeFocus(false), []);
    assert.deepStrictEqual(normalizeFocus(undefined), []);
  });

  test('frame overrides switch members off', () => {
    assert.deepStrictEqual(enabledFocusForFrame('does_it_last', { docs: false, hygiene: true }), [
      'patterns',
      'hygiene',
      'dependencies',
    ]);
    assert.deepStrictEqual(enabledFocusForFrame('unknown_frame'), []);
  });

  test('finds the frame of a focus area', () => {
    assert.strictEqual(frameForFocus('performance'), 'can_we_prove_it');
    assert.strictEqual(frameForFocus('nonexistent'), undefined);
  });
});

suite('Focus areas', () => {
  test('registry lists areas in file order', () => {
    assert.deepStrictEqual(allFocusNames(), ALL);
  });

  test('every area has a prompt and patterns', () => {
    for (const name of ALL) {
      const area = getFocusArea(name);
      assert.ok(area.prompt.length > 0, name);
      assert.ok(area.patterns.length > 0, name);
    }
  });

  test('an unknown area is a config error', () => {
    assert.throws(
      () => getFocusArea('style'),
      (err: unknown) => err instanceof ConfigError && err.message.startsWith('Unknown focus area: style. Available: security, docs')
    );
  });

  test('patterns are merged, sorted and de-duplicated', () => {
    const merged = patternsFor([getFocusArea('security'), getFocusArea('docs')]);
    assert.deepStrictEqual(merged, [...new Set(merged)].sort());
    assert.ok(merged.includes('**/*.md'));
    assert.ok(merged.includes('**/Dockerfile*'));
  });

  test('a single area uses its own prompt', () => {
    const security = getFocusArea('security');
    assert.strictEqual(buildCombinedPrompt([security]), security.prompt);
  });

  test('combined prompts ask for a focus tag and carry each section', () => {
    const security = getFocusArea('security');
    const docs = getFocusArea('docs');
    const prompt = buildCombinedPrompt([security, docs]);

    assert.ok(prompt.includes('include a `focus` field indicating which focus area (security, docs)'));
    assert.ok(prompt.includes(`## Focus Area: security\n\n${security.prompt}`));
    assert.ok(prompt.includes(`## Focus Area: docs\n\n${docs.prompt}`));
    assert.strictEqual(focusLabel(['security', 'docs']), 'security+docs');
  });
});
