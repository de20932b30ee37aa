import { pino, destination } from 'pino';
import type { Logger } from 'pino';
import { getConfig } from './config.js';

// stdout carries the MCP protocol, so logs go to stderr
export const logger: Logger = pino(
  { name: 'fairness-sentinel', level: getConfig().logLevel },
  destination(2),
);

export function withSystemId(parent: Logger, systemId: string): Logger {
  return parent.child({ systemId });
}
