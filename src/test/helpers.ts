import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Finding } from '../audit/types.js';

export function makeTempDir(prefix = 'codesweep-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content, 'utf8');
  }
}

export function finding(id: string, overrides: Partial<Finding> = {}): Finding {
  return {
    id,
    severity: 'medium',
    file: 'src/app.py',
    title: `Finding ${id}`,
    description: 'Something to look at',
    ...overrides,
  };
}
