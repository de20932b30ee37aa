/**
 * Tool Responses
 *
 * Wraps a handler result as MCP text content. Rejected input becomes
 * an error result the client can read; anything else propagates.
 */

import type { Logger } from 'pino';
import { isInvalidInputError } from '../errors.js';
import { logger as rootLogger } from '../logger.js';

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function textResponse(result: unknown): ToolResponse {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
  };
}

export async function respond(
  tool: string,
  handler: () => unknown,
  log: Logger = rootLogger,
): Promise<ToolResponse> {
  try {
    return textResponse(await handler());
  } catch (error) {
    if (!isInvalidInputError(error)) throw error;

    log.warn({ tool, issues: error.issues }, 'tool input rejected');
    return {
      content: [{ type: 'text' as const, text: JSON.stringify({ error: error.code, issues: error.issues }, null, 2) }],
      isError: true,
    };
  }
}
