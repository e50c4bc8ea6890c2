import fs from 'node:fs';
import path from 'node:path';

/** Returns the parsed document, or undefined when the file does not exist. */
export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return undefined;
  const txt = fs.readFileSync(filePath, 'utf8');
  try {
    return JSON.parse(txt);
  } catch (err) {
    throw new SyntaxError(`Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function writeJsonFile(filePath: string, value: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(value, null, 2) + '\n', 'utf8');
}

export function removeFile(filePath: string): void {
  fs.rmSync(filePath, { force: true });
}
