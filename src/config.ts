import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { enabledFocusForFrame, FRAMES, type ScheduleEntry } from './audit/frames.js';
import type { PrepassSettings } from './audit/prepass.js';
import type { Severity } from './audit/types.js';
import { ConfigError, describeZodError, errorMessage } from './lib/errors.js';

export const DEFAULT_CONFIG_FILE = 'codesweep.yml';

export const WEEKDAY_NAMES = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;

export const DEFAULT_SCHEDULE: Record<string, ScheduleEntry> = {
  monday: 'security',
  tuesday: 'patterns',
  wednesday: 'docs',
  thursday: 'hygiene',
  friday: 'performance',
  saturday: 'dependencies',
  sunday: 'off',
};

export type RepoConfig = {
  name: string;
  path: string;
  providerRotation: string[];
  exclude: string[];
};

export type AuditConfig = {
  repos: RepoConfig[];
  schedule: Record<string, ScheduleEntry>;
  /** Per-frame focus switches, e.g. `{ does_it_last: { docs: false } }`. */
  frames: Record<string, Record<string, boolean>>;
  budget: { maxPerRunUsd: number; alertThresholdUsd: number };
  notifications: Array<{ channel: 'telegram'; target: string }>;
  decisions: { expiryDays: number; path: string };
  issues: { enabled: boolean; severityThreshold: Severity; labels: string[]; assignees: string[]; repository?: string };
  prepass: PrepassSettings;
  reportsDir: string;
  stateDir: string;
  model: string;
  /** Per-provider model overrides. */
  models: Partial<Record<string, string>>;
};

const scheduleEntrySchema = z.union([z.string(), z.array(z.string()), z.boolean()]);

const configSchema = z.object({
  repos: z
    .array(
      z.object({
        name: z.string().min(1),
        path: z.string().min(1),
        provider_rotation: z.array(z.string().min(1)).min(1).default(['gemini']),
        exclude: z.array(z.string()).default([]),
      })
    )
    .default([]),
  schedule: z.record(scheduleEntrySchema).default({}),
  frames: z.record(z.record(z.boolean())).default({}),
  budget: z
    .object({
      max_per_run_usd: z.number().nonnegative().default(2),
      alert_threshold_usd: z.number().nonnegative().default(1.5),
    })
    .default({}),
  notifications: z
    .array(
      z.object({
        channel: z.literal('telegram'),
        target: z.union([z.string(), z.number()]).transform(String).default(''),
      })
    )
    .default([]),
  decisions: z
    .object({
      expiry_days: z.number().int().positive().default(90),
      path: z.string().min(1).default('.codesweep/decisions.jsonl'),
    })
    .default({}),
  issues: z
    .object({
      enabled: z.boolean().default(false),
      severity_threshold: z.enum(['low', 'medium', 'high']).default('medium'),
      labels: z.array(z.string()).default(['codesweep']),
      assignees: z.array(z.string()).default([]),
      repository: z
        .string()
        .regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/name')
        .optional(),
    })
    .default({}),
  prepass: z
    .object({
      enabled: z.boolean().default(false),
      threshold_tokens: z.number().int().positive().default(600_000),
      auto_disable: z.boolean().default(false),
      provider: z.string().default('gemini'),
      model: z.string().default('gemini-2.5-flash'),
    })
    .default({}),
  reports_dir: z.string().min(1).default('.codesweep/reports'),
  state_dir: z.string().min(1).default('.codesweep'),
  model: z.string().min(1).default('claude-sonnet-4-5'),
  models: z.record(z.string()).default({}),
});

function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** Validates a parsed YAML document (or `{}`) into a config with every default filled. */
export function parseConfig(raw: unknown): AuditConfig {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) throw new ConfigError(`Invalid configuration: ${describeZodError(parsed.error)}`);
  const c = parsed.data;

  const names = new Set<string>();
  for (const repo of c.repos) {
    if (names.has(repo.name)) throw new ConfigError(`Duplicate repository name: ${repo.name}`);
    names.add(repo.name);
  }

  return {
    repos: c.repos.map((r) => ({
      name: r.name,
      path: expandHome(r.path),
      providerRotation: r.provider_rotation,
      exclude: r.exclude,
    })),
    schedule: { ...DEFAULT_SCHEDULE, ...c.schedule },
    frames: c.frames,
    budget: { maxPerRunUsd: c.budget.max_per_run_usd, alertThresholdUsd: c.budget.alert_threshold_usd },
    notifications: c.notifications,
    decisions: { expiryDays: c.decisions.expiry_days, path: c.decisions.path },
    issues: {
      enabled: c.issues.enabled,
      severityThreshold: c.issues.severity_threshold,
      labels: c.issues.labels,
      assignees: c.issues.assignees,
      repository: c.issues.repository,
    },
    prepass: {
      enabled: c.prepass.enabled,
      thresholdTokens: c.prepass.threshold_tokens,
      autoDisable: c.prepass.auto_disable,
      provider: c.prepass.provider,
      model: c.prepass.model,
    },
    reportsDir: c.reports_dir,
    stateDir: c.state_dir,
    model: c.model,
    models: c.models,
  };
}

/** Reads the YAML config; a missing file yields the defaults. */
export function loadConfig(configPath: string = process.env.CODESWEEP_CONFIG?.trim() || DEFAULT_CONFIG_FILE): AuditConfig {
  if (!fs.existsSync(configPath)) return parseConfig({});

  let raw: unknown;
  try {
    raw = YAML.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot parse ${configPath}: ${errorMessage(err)}`);
  }
  return parseConfig(raw);
}

export function weekdayName(date: Date): (typeof WEEKDAY_NAMES)[number] {
  return WEEKDAY_NAMES[(date.getDay() + 6) % 7];
}

/** Today's schedule entry, with frame names expanded through their overrides. */
export function todayFocus(config: AuditConfig, now: Date = new Date()): ScheduleEntry {
  const entry = config.schedule[weekdayName(now)] ?? 'off';
  if (typeof entry === 'string' && Object.hasOwn(FRAMES, entry)) {
    return enabledFocusForFrame(entry, config.frames[entry]);
  }
  return entry;
}

export function providerForRepo(config: AuditConfig, repoName: string, runIndex = 0): string {
  const repo = config.repos.find((r) => r.name === repoName);
  if (!repo) return 'gemini';
  const rotation = repo.providerRotation;
  return rotation[runIndex % rotation.length];
}
