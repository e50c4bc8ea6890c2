#!/usr/bin/env node
import { summarizeCosts, renderCostSummary } from '../audit/cost-summary.js';
import { CostLedger } from '../audit/ledger.js';
import { statePaths } from '../audit/state.js';
import { loadConfig } from '../config.js';
import { getArg } from './args.js';

async function main() {
  const config = loadConfig(getArg('config'));
  const days = Number(getArg('days') ?? 30);
  if (!Number.isInteger(days) || days <= 0) throw new Error('--days must be a positive integer');

  const ledger = new CostLedger(statePaths(config.stateDir).ledger);
  const entries = ledger.lastNDays(days);
  console.log(renderCostSummary(summarizeCosts(entries), days));
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
