import fs from 'node:fs';
import { z } from 'zod';
import { ConfigError, describeZodError } from '../lib/errors.js';

export type FocusArea = {
  name: string;
  description: string;
  patterns: string[];
  prompt: string;
};

const FOCUS_DIR = new URL('../../focus/', import.meta.url);

const areasFileSchema = z.record(
  z.object({
    description: z.string(),
    patterns: z.array(z.string()).min(1),
  })
);

let registry: Map<string, FocusArea> | undefined;

function loadRegistry(): Map<string, FocusArea> {
  const raw: unknown = JSON.parse(fs.readFileSync(new URL('areas.json', FOCUS_DIR), 'utf8'));
  const parsed = areasFileSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(`Invalid focus/areas.json: ${describeZodError(parsed.error)}`);

  const areas = new Map<string, FocusArea>();
  for (const [name, area] of Object.entries(parsed.data)) {
    const prompt = fs.readFileSync(new URL(`prompts/${name}.md`, FOCUS_DIR), 'utf8').trim();
    areas.set(name, { name, description: area.description, patterns: area.patterns, prompt });
  }
  return areas;
}

export function focusAreas(): Map<string, FocusArea> {
  registry ??= loadRegistry();
  return registry;
}

/** Every known focus name in registry order. */
export function allFocusNames(): string[] {
  return [...focusAreas().keys()];
}

export function getFocusArea(name: string): FocusArea {
  const area = focusAreas().get(name);
  if (!area) throw new ConfigError(`Unknown focus area: ${name}. Available: ${allFocusNames().join(', ')}`);
  return area;
}

/** Sorted, de-duplicated union of the glob patterns of the given areas. */
export function patternsFor(areas: FocusArea[]): string[] {
  return [...new Set(areas.flatMap((a) => a.patterns))].sort();
}

export function focusLabel(names: string[]): string {
  return names.join('+');
}

/** One area gets its own prompt; several get a tagging header and a section each. */
export function buildCombinedPrompt(areas: FocusArea[]): string {
  if (areas.length === 1) return areas[0].prompt;

  const sections: string[] = [];
  sections.push(
    'You are performing a combined codebase audit covering multiple focus areas. ' +
      'For each finding, include a `focus` field indicating which focus area ' +
      `(${areas.map((a) => a.name).join(', ')}) the finding belongs to.\n`
  );
  for (const area of areas) {
    sections.push(`## Focus Area: ${area.name}\n`);
    sections.push(area.prompt);
    sections.push('');
  }
  return sections.join('\n');
}
