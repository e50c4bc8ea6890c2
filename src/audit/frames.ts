import { allFocusNames } from './focus.js';

export const FRAMES: Record<string, string[]> = {
  does_it_work: ['security', 'testing'],
  does_it_feel_right: [],
  can_everyone_use_it: [],
  does_it_last: ['patterns', 'hygiene', 'docs', 'dependencies'],
  can_we_prove_it: ['performance'],
};

export const FRAME_LABELS: Record<string, string> = {
  does_it_work: 'Does it work?',
  does_it_feel_right: 'Does it feel right?',
  can_everyone_use_it: 'Can everyone use it?',
  does_it_last: 'Does it last?',
  can_we_prove_it: 'Can we prove it?',
};

/** A schedule value as written in YAML: `off` may arrive as `false`. */
export type ScheduleEntry = string | string[] | boolean;

function isFrame(name: string): boolean {
  return Object.hasOwn(FRAMES, name);
}

export function frameForFocus(focus: string): string | undefined {
  return Object.keys(FRAMES).find((frame) => FRAMES[frame].includes(focus));
}

/** Frame members minus any focus switched off in `overrides`. */
export function enabledFocusForFrame(frame: string, overrides?: Record<string, boolean>): string[] {
  const base = FRAMES[frame] ?? [];
  if (!overrides) return [...base];
  return base.filter((f) => overrides[f] !== false);
}

/** Expands frame names, `all`, `off` and comma lists into focus names. */
export function resolveScheduleEntry(entry: string): string[] {
  const trimmed = entry.trim();
  if (trimmed === 'off' || trimmed === '') return [];
  if (trimmed === 'all') return allFocusNames();
  if (trimmed.includes(',')) return trimmed.split(',').flatMap((part) => resolveScheduleEntry(part));
  if (isFrame(trimmed)) return [...FRAMES[trimmed]];
  return [trimmed];
}

export function normalizeFocus(raw: ScheduleEntry | null | undefined): string[] {
  if (raw === undefined || raw === null || raw === false) return [];
  if (raw === true) return allFocusNames();
  if (Array.isArray(raw)) return raw.flatMap((item) => resolveScheduleEntry(item));
  return resolveScheduleEntry(raw);
}
