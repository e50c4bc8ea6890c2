import type { ContentTier, FileClassification, FileContent } from './types.js';

export const FILE_MAP_HEADER = '# [file map: definitions only]';

const DEFINITION_RE =
  /^(class |def |async def |function |async function |interface |type |enum |struct |impl |fn |pub fn |func |export\s+(default\s+)?(async\s+)?(abstract\s+)?(class|function|const|let|var|interface|type|enum)\s)/;
const COMMENT_RE = /^\s*(#|\/\/|\/\*|\*|"""|''')/;

function splitLines(text: string): string[] {
  const body = text.replace(/\r?\n$/, '');
  return body === '' ? [] : body.split(/\r?\n/);
}

/** Head and tail halves around an omission marker; short files pass through. */
export function extractSnippet(file: FileContent, maxLines = 50): FileContent {
  const lines = splitLines(file.content);
  if (lines.length <= maxLines) return file;

  const half = Math.floor(maxLines / 2);
  const omitted = lines.length - half * 2;
  return {
    path: file.path,
    content: [...lines.slice(0, half), `... [${omitted} lines omitted] ...`, ...lines.slice(-half)].join('\n'),
  };
}

/** Definition and comment lines only, or the first 20 lines when there are none. */
export function extractFileMap(file: FileContent): FileContent {
  const lines = splitLines(file.content);
  let kept = lines.filter((line) => DEFINITION_RE.test(line.trim()) || COMMENT_RE.test(line));
  if (!kept.length) kept = lines.slice(0, 20);
  return { path: file.path, content: [FILE_MAP_HEADER, ...kept].join('\n') };
}

function applyTier(file: FileContent, tier: ContentTier): FileContent | undefined {
  switch (tier) {
    case 'full':
      return file;
    case 'snippet':
      return extractSnippet(file);
    case 'map':
      return extractFileMap(file);
    case 'skip':
      return undefined;
  }
}

/** Replaces each file with the excerpt its tier calls for, in input order. Blank files are dropped. */
export function enrichFiles(files: FileContent[], classified: FileClassification[]): FileContent[] {
  const tiers = new Map(classified.map((c) => [c.path, c.tier]));
  const out: FileContent[] = [];
  for (const file of files) {
    if (!file.content.trim()) continue;
    const enriched = applyTier(file, tiers.get(file.path) ?? 'skip');
    if (enriched) out.push(enriched);
  }
  return out;
}
