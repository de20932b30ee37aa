/**
 * Fairness walkthrough example.
 *
 * Scores a small loan-approval batch and records the snapshot, then
 * replays ten days of a widening parity gap for a second system and asks
 * the drift monitor whether anything moved.
 *
 * Usage:
 *   npx tsx examples/fairness_walkthrough.ts
 */

import { pino } from 'pino';
import type { SampleBatch } from '../mcp-server/src/types/index.js';
import { evaluateFairness } from '../mcp-server/src/fairness/index.js';
import { InMemoryHistoryStore } from '../mcp-server/src/bridge/history-store.js';
import { DriftMonitor, HistoryRecorder } from '../mcp-server/src/monitoring/index.js';

const quiet = pino({ level: 'silent' });

// ---------------------------------------------------------------------------
// Scenario: 12 applicants, two regions. Region "north" is approved more
// often than region "south" at the same qualification rate.
// ---------------------------------------------------------------------------

const batch: SampleBatch = {
  labels: [1, 1, 1, 0, 0, 0, 1, 1, 1, 0, 0, 0],
  predictions: [1, 1, 1, 1, 0, 0, 1, 0, 0, 0, 0, 0],
  scores: [0.9, 0.8, 0.7, 0.6, 0.3, 0.2, 0.6, 0.4, 0.3, 0.2, 0.1, 0.1],
  attributes: {
    region: ['north', 'north', 'north', 'north', 'north', 'north',
             'south', 'south', 'south', 'south', 'south', 'south'],
  },
};

console.log('Fairness Walkthrough');
console.log('====================\n');

const snapshot = evaluateFairness(batch, { systemId: 'loan-approvals', logger: quiet });

for (const result of Object.values(snapshot.metrics)) {
  console.log(`  ${result.explanation}`);
}
console.log(`\nCategory score: ${snapshot.assessment.categoryScore?.toFixed(3) ?? 'n/a'}`);
for (const issue of snapshot.assessment.criticalIssues) {
  console.log(`  ✋ ${issue.description}`);
  console.log(`     → ${issue.mitigation}`);
}

// ---------------------------------------------------------------------------
// Drift: ten daily demographic-parity readings, stable then widening.
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const store = new InMemoryHistoryStore();
  const recorder = new HistoryRecorder(store, quiet);
  await recorder.record(snapshot);

  const gaps = [0.05, 0.06, 0.05, 0.04, 0.05, 0.12, 0.18, 0.22, 0.25, 0.27];
  for (const [day, gap] of gaps.entries()) {
    const timestamp = new Date(Date.UTC(2030, 0, day + 1)).toISOString();
    await store.appendMetricValue('credit-limits', 'demographic_parity', timestamp, gap);
  }

  const monitor = new DriftMonitor(store, {}, { logger: quiet });
  const report = await monitor.checkSystem('credit-limits', ['demographic_parity', 'equal_opportunity']);

  console.log('\n--- Drift check: credit-limits ---');
  console.log(`  Overall severity: ${report.overallSeverity}`);
  for (const verdict of report.verdicts) {
    if (verdict.status === 'insufficient_data') {
      console.log(`  ${verdict.metric}: pending (${verdict.available}/${verdict.required} points)`);
      continue;
    }
    for (const event of verdict.events) {
      console.log(`  ${verdict.metric} [${event.method}] change ${event.change.toFixed(3)} → ${event.severity}`);
    }
  }
  for (const recommendation of report.recommendations) {
    console.log(`  ${recommendation}`);
  }
}

main().catch((error: unknown) => {
  console.error('Walkthrough failed:', error);
  process.exit(1);
});
