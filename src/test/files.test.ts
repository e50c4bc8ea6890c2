import * as assert from 'assert';
import { estimateTokens, isExcluded, MAX_FILE_SIZE, selectFiles } from '../audit/files.js';
import { makeTempDir, removeDir, writeFiles } from './helpers.js';

suite('File selection', () => {
  let repo: string;

  setup(() => {
    repo = makeTempDir();
  });

  teardown(() => removeDir(repo));

  test('configured excludes drop matching directories', async () => {
    writeFiles(repo, { 'src/app.py': 'x = 1\n', 'vendor/lib.py': 'y = 2\n', 'README.md': '# hi\n' });

    const files = await selectFiles(repo, ['**/*.py'], ['vendor']);

    assert.deepStrictEqual(
      files.map((f) => f.path),
      ['src/app.py']
    );
    assert.strictEqual(files[0].content, 'x = 1\n');
  });

  test('default excludes always apply', async () => {
    writeFiles(repo, {
      'app.js': 'a',
      'node_modules/pkg/index.js': 'b',
      'dist/bundle.js': 'c',
      'lib/__pycache__/x.js': 'd',
    });

    const files = await selectFiles(repo, ['**/*.js']);

    assert.deepStrictEqual(
      files.map((f) => f.path),
      ['app.js']
    );
  });

  test('files over the size cap are skipped', async () => {
    writeFiles(repo, { 'small.py': 'ok\n', 'huge.py': 'x'.repeat(MAX_FILE_SIZE + 1) });

    const files = await selectFiles(repo, ['**/*.py']);

    assert.deepStrictEqual(
      files.map((f) => f.path),
      ['small.py']
    );
  });

  test('follows sorted pattern order and keeps each path once', async () => {
    writeFiles(repo, { 'b.ts': 'b', 'a.ts': 'a', 'README.md': 'r', 'src/c.ts': 'c' });

    const files = await selectFiles(repo, ['**/*.ts', '**/*.md', 'src/**', '**/*.ts']);

    assert.deepStrictEqual(
      files.map((f) => f.path),
      ['README.md', 'a.ts', 'b.ts', 'src/c.ts']
    );
  });

  test('dotfiles are matched', async () => {
    writeFiles(repo, { '.github/workflows/ci.yml': 'on: push\n' });

    const files = await selectFiles(repo, ['**/*.yml']);

    assert.deepStrictEqual(
      files.map((f) => f.path),
      ['.github/workflows/ci.yml']
    );
  });

  test('isExcluded matches segments and multi-segment prefixes', () => {
    assert.strictEqual(isExcluded('a/vendor/b.py', ['vendor']), true);
    assert.strictEqual(isExcluded('a/vendors/b.py', ['vendor']), false);
    assert.strictEqual(isExcluded('bootstrap/cache/x.php', ['bootstrap/cache']), true);
    assert.strictEqual(isExcluded('app/bootstrap/cache/x.php', ['bootstrap/cache']), false);
    assert.strictEqual(isExcluded('bootstrap/cached.php', ['bootstrap/cache/']), false);
  });

  test('estimates four characters per token', () => {
    assert.strictEqual(
      estimateTokens([
        { path: 'a', content: 'x'.repeat(10) },
        { path: 'b', content: 'y'.repeat(5) },
      ]),
      3
    );
  });
});
