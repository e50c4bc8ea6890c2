#!/usr/bin/env node
import { loadConfig } from '../config.js';
import { isoDate, saveDecision } from '../memory/decisions.js';
import type { Decision, DecisionKind } from '../memory/types.js';
import { getArg } from './args.js';

const ACTIONS: Record<string, DecisionKind> = {
  accept: 'accepted',
  dismiss: 'dismissed',
  intentional: 'intentional',
};

async function main() {
  const findingId = getArg('finding');
  if (!findingId) throw new Error('Missing --finding <id>');

  const action = getArg('action');
  const kind = action ? ACTIONS[action] : undefined;
  if (!action || !kind) throw new Error('Specify --action accept|dismiss|intentional');

  const reason = getArg('reason');
  if (!reason) throw new Error('Missing --reason <text>');

  const config = loadConfig(getArg('config'));
  const decision: Decision = {
    finding_id: findingId,
    decision: kind,
    reason,
    date: isoDate(new Date()),
    by: getArg('by') || 'user',
  };
  const repo = getArg('repo');
  if (repo) decision.repo = repo;

  saveDecision(config.decisions.path, decision);
  console.log(`Decision recorded: ${action} finding ${findingId}`);
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
