/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

import type { PipelineConfigOverrides } from '../services/config.js';
import type { RagRuntime, RuntimeOverrides } from '../services/runtime.js';

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

/**
 * Server state tracking
 */
export interface ServerState {
  /** Runtime created on first tool call */
  runtime: RagRuntime | null;

  /** Applied on top of the environment when the runtime is created */
  configOverrides: PipelineConfigOverrides;

  /** Injected providers, used by tests */
  runtimeOverrides: RuntimeOverrides;
}
