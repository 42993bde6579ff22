/**
 * Troubleshooting Query MCP Tool
 *
 * Tools: manual_query
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/query
 */

import { requireRuntime } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, QueryInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export async function handleQuery(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(QueryInput, params);
    const result = await requireRuntime().query(input.query, {
      deviceType: input.device_type,
      brand: input.brand,
      model: input.model,
      topK: input.top_k,
      relevanceThreshold: input.relevance_threshold,
    });
    return formatResponse(
      successResult({
        answer: result.answer,
        sources: result.sources,
        context_found: result.contextFound,
        model: result.model,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const queryTools: Record<string, ToolDefinition> = {
  manual_query: {
    description:
      'Ask a troubleshooting question. Retrieves the most relevant manual excerpts (optionally filtered by device_type, brand, model) and returns step-by-step instructions with cited sources. context_found=false means no manual excerpt was relevant enough.',
    inputSchema: QueryInput.shape,
    handler: handleQuery,
  },
};
