import type { Severity } from '../audit/types.js';

export type DecisionKind = 'accepted' | 'dismissed' | 'intentional';

export const DECISION_KINDS: readonly DecisionKind[] = ['accepted', 'dismissed', 'intentional'];

/** One adjudication of a finding. Records are never edited, only superseded. */
export type Decision = {
  finding_id: string;
  decision: DecisionKind;
  reason: string;
  /** YYYY-MM-DD */
  date: string;
  by: string;
  file?: string;
  file_hash?: string;
  focus?: string;
  severity?: Severity;
  repo?: string;
};

export type BaselineFilter = {
  focus?: string[];
  severity?: Severity[];
  repo?: string;
};
