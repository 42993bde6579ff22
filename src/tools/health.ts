/**
 * Health MCP Tool
 *
 * Tools: manual_health
 *
 * Reports the database and sqlite-vec extension, the embedding provider
 * and whether the language model can be reached. An unhealthy service is
 * a successful report, not a tool error.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/health
 */

import { requireRuntime } from '../server/state.js';
import { successResult } from '../server/types.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export async function handleHealth(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const report = await requireRuntime().health();
    return formatResponse(successResult(report));
  } catch (error) {
    return handleError(error);
  }
}

export const healthTools: Record<string, ToolDefinition> = {
  manual_health: {
    description:
      'Check the manual index database, the embedding provider and the language model. Returns healthy, degraded (model unreachable) or unhealthy per service.',
    inputSchema: {},
    handler: handleHealth,
  },
};
