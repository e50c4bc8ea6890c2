export type Severity = 'high' | 'medium' | 'low';

export const SEVERITIES: readonly Severity[] = ['high', 'medium', 'low'];

export type FileContent = {
  /** Relative to the repository root, forward slashes. */
  path: string;
  content: string;
};

export type Finding = {
  id: string;
  severity: Severity;
  file: string;
  line?: number;
  title: string;
  description: string;
  suggestion?: string;
  focus?: string;
};

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheWriteTokens: number;
};

export type AuditResult = {
  repo: string;
  /** Focus label, e.g. "security" or "security+docs". */
  focus: string;
  provider: string;
  findings: Finding[];
  newFindings: Finding[];
  resolvedCount: number;
  timestamp: string;
};

export type ContentTier = 'full' | 'snippet' | 'map' | 'skip';

export type FileClassification = {
  path: string;
  tier: ContentTier;
  reason?: string;
};

export type PendingBatchEntry = {
  repo: string;
  batch_id: string;
  provider: string;
  file_count: number;
};

export type PendingBatch = {
  submitted_at: string;
  focus: string;
  focus_names: string[];
  /** Every job id of the submission; `batches` shrinks as jobs are retrieved. */
  all_batch_ids: string[];
  batches: PendingBatchEntry[];
};

export function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, cacheReadTokens: 0, cacheWriteTokens: 0 };
}

export function severityRank(s: Severity): number {
  return s === 'high' ? 3 : s === 'medium' ? 2 : 1;
}
