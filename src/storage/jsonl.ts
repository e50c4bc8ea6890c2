import fs from 'node:fs';
import path from 'node:path';

export type JsonlRecord = {
  lineNumber: number;
  raw: string;
  value: unknown;
};

export function appendJsonl(filePath: string, record: unknown): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(record) + '\n', 'utf8');
}

/**
 * Reads every non-blank line of a JSONL file. Lines that are not valid JSON are
 * handed to `onInvalidLine` (which may throw) and otherwise skipped.
 */
export function readJsonl(
  filePath: string,
  onInvalidLine?: (lineNumber: number, raw: string) => void
): JsonlRecord[] {
  if (!fs.existsSync(filePath)) return [];
  const txt = fs.readFileSync(filePath, 'utf8');
  const out: JsonlRecord[] = [];
  txt.split(/\r?\n/).forEach((raw, idx) => {
    if (!raw.trim()) return;
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      onInvalidLine?.(idx + 1, raw);
      return;
    }
    out.push({ lineNumber: idx + 1, raw, value });
  });
  return out;
}

/** Replaces the file with the given raw lines, one per line. */
export function writeJsonlLines(filePath: string, lines: string[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  fs.writeFileSync(tmp, lines.map((l) => l + '\n').join(''), 'utf8');
  fs.renameSync(tmp, filePath);
}
