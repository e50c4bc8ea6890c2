import fs from 'node:fs/promises';
import path from 'node:path';
import * as core from '@actions/core';
import fg from 'fast-glob';
import { errorMessage } from '../lib/errors.js';
import type { FileContent } from './types.js';

export const DEFAULT_EXCLUDES = ['node_modules', '.git', '__pycache__', '.venv', 'venv', 'dist', 'build'] as const;

/** Larger files are almost always generated or vendored. */
export const MAX_FILE_SIZE = 50_000;

function normalizeExclude(entry: string): string {
  return entry.replace(/\\/g, '/').replace(/^\/+|\/+$/g, '');
}

/**
 * A single-segment entry matches any path segment; a multi-segment entry
 * (`bootstrap/cache`) matches as a path prefix.
 */
export function isExcluded(relativePath: string, excludes: readonly string[]): boolean {
  const segments = relativePath.split('/');
  return excludes.some((raw) => {
    const excluded = normalizeExclude(raw);
    if (!excluded) return false;
    if (excluded.includes('/')) return relativePath === excluded || relativePath.startsWith(`${excluded}/`);
    return segments.includes(excluded);
  });
}

/**
 * Files under `repoRoot` matching any of `patterns`, in sorted pattern order
 * with each pattern's matches sorted by path. A path is kept once, at its first match.
 */
export async function selectFiles(repoRoot: string, patterns: string[], exclude: string[] = []): Promise<FileContent[]> {
  const excludes = [...DEFAULT_EXCLUDES, ...exclude];
  const seen = new Set<string>();
  const files: FileContent[] = [];

  for (const pattern of [...new Set(patterns)].sort()) {
    const matches = await fg(pattern, {
      cwd: repoRoot,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      ignore: DEFAULT_EXCLUDES.map((d) => `**/${d}/**`),
      suppressErrors: true,
    });

    for (const rel of matches.sort()) {
      if (seen.has(rel) || isExcluded(rel, excludes)) continue;

      const abs = path.join(repoRoot, rel);
      try {
        const stat = await fs.lstat(abs);
        if (!stat.isFile() || stat.size > MAX_FILE_SIZE) continue;
        const content = await fs.readFile(abs, 'utf8');
        files.push({ path: rel, content });
        seen.add(rel);
      } catch (err) {
        core.warning(`Skipping unreadable file ${rel}: ${errorMessage(err)}`);
      }
    }
  }

  return files;
}

export function totalChars(files: FileContent[]): number {
  return files.reduce((acc, f) => acc + f.content.length, 0);
}

/** Four characters per token, floored. */
export function estimateTokens(files: FileContent[]): number {
  return Math.floor(totalChars(files) / 4);
}
