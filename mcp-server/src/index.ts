/**
 * Fairness Sentinel MCP Server
 *
 * Exposes 5 MCP tools:
 * 1. evaluate_fairness   — Score a labeled batch across the six fairness metrics
 * 2. check_drift         — Check recorded metric history for fairness drift
 * 3. compare_metrics     — Compare a baseline and a current metric reading
 * 4. get_metric_history  — Read the recorded history of one metric
 * 5. get_drift_reports   — Read the drift reports kept by check_drift
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { evaluateFairnessTool, evaluateFairnessSchema } from './tools/evaluate.js';
import {
  checkDrift,
  checkDriftSchema,
  compareMetricReadings,
  compareMetricsSchema,
} from './tools/drift.js';
import {
  getDriftReports,
  getDriftReportsSchema,
  getMetricHistory,
  getMetricHistorySchema,
} from './tools/history.js';
import { respond } from './tools/response.js';
import { getConfig } from './config.js';
import { logger } from './logger.js';

const server = new McpServer({
  name: 'fairness-sentinel',
  version: '0.1.0',
});

// --- Tool Registration ---

server.tool(
  'evaluate_fairness',
  'Evaluate a labeled batch of model decisions for bias. Computes demographic parity, equal opportunity, equalized odds, predictive parity, calibration and subgroup performance, each with a normalized score, and aggregates them into a category score with critical issues. The snapshot is recorded to history unless record=false.',
  evaluateFairnessSchema.shape,
  (input) => respond('evaluate_fairness', () => evaluateFairnessTool(input)),
);

server.tool(
  'check_drift',
  'Check recorded fairness history for drift. Compares the latest window against the preceding window with delta, Welch t-test and control-chart methods and reports the worst severity (none/minor/major) per metric.',
  checkDriftSchema.shape,
  (input) => respond('check_drift', () => checkDrift(input)),
);

server.tool(
  'compare_metrics',
  'Compare baseline and current metric values. Returns the change, percent change and drift severity for every metric present in both.',
  compareMetricsSchema.shape,
  (input) => respond('compare_metrics', () => compareMetricReadings(input)),
);

server.tool(
  'get_metric_history',
  'Get the recorded values of one fairness metric (or category_score) for a system, oldest first.',
  getMetricHistorySchema.shape,
  (input) => respond('get_metric_history', () => getMetricHistory(input)),
);

server.tool(
  'get_drift_reports',
  'Get the drift reports that check_drift kept for a system because they detected drift, oldest first.',
  getDriftReportsSchema.shape,
  (input) => respond('get_drift_reports', () => getDriftReports(input)),
);

// --- Server Startup ---

async function main(): Promise<void> {
  const config = getConfig();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(
    { minGroupSize: config.minGroupSize, driftWindowSize: config.driftWindowSize },
    'fairness sentinel server started',
  );
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'fairness sentinel server failed to start');
  process.exit(1);
});
