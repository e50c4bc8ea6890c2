import * as assert from 'assert';
import { enrichFiles, extractFileMap, extractSnippet, FILE_MAP_HEADER } from '../audit/excerpts.js';

function numbered(count: number): string {
  return Array.from({ length: count }, (_, i) => `line${i + 1}`).join('\n') + '\n';
}

suite('Excerpts', () => {
  test('snippet keeps head and tail around an omission marker', () => {
    const snippet = extractSnippet({ path: 'big.py', content: numbered(60) });

    const lines = snippet.content.split('\n');
    assert.strictEqual(lines.length, 51);
    assert.strictEqual(lines[0], 'line1');
    assert.strictEqual(lines[24], 'line25');
    assert.strictEqual(lines[25], '... [10 lines omitted] ...');
    assert.strictEqual(lines[26], 'line36');
    assert.strictEqual(lines[50], 'line60');
  });

  test('short files pass through untouched', () => {
    const file = { path: 'small.py', content: numbered(50) };
    assert.strictEqual(extractSnippet(file), file);
  });

  test('file map keeps definitions and comments', () => {
    const map = extractFileMap({
      path: 'mod.py',
      content: 'import os\n\nclass Foo:\n    def bar(self):\n        return 1\n# note\n',
    });

    assert.strictEqual(map.content, [FILE_MAP_HEADER, 'class Foo:', '    def bar(self):', '# note'].join('\n'));
  });

  test('file map falls back to the opening lines', () => {
    const map = extractFileMap({ path: 'cfg.py', content: 'a = 1\nb = 2\n' });

    assert.strictEqual(map.content, [FILE_MAP_HEADER, 'a = 1', 'b = 2'].join('\n'));
  });

  test('enrichment applies tiers and drops unclassified files', () => {
    const a = { path: 'A.ts', content: 'const a = 1;\n' };
    const b = { path: 'B.ts', content: 'export function b() {}\nconst x = 2;\n' };
    const c = { path: 'C.ts', content: 'const c = 3;\n' };

    const out = enrichFiles(
      [a, b, c],
      [
        { path: 'A.ts', tier: 'full' },
        { path: 'B.ts', tier: 'map' },
      ]
    );

    assert.deepStrictEqual(out, [a, { path: 'B.ts', content: `${FILE_MAP_HEADER}\nexport function b() {}` }]);
  });

  test('blank files are never sent, whatever their tier', () => {
    const kept = { path: 'A.ts', content: 'const a = 1;\n' };

    const out = enrichFiles(
      [
        { path: 'empty.ts', content: '' },
        { path: 'blank.ts', content: '\n  \n' },
        { path: 'mapped.ts', content: '' },
        kept,
      ],
      [
        { path: 'empty.ts', tier: 'full' },
        { path: 'blank.ts', tier: 'snippet' },
        { path: 'mapped.ts', tier: 'map' },
        { path: 'A.ts', tier: 'full' },
      ]
    );

    assert.deepStrictEqual(out, [kept]);
  });
});
