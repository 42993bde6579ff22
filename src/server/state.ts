/**
 * MCP Server State Management
 *
 * Holds the process-wide RagRuntime. It is created lazily from the
 * environment on first use, so a configuration error surfaces on the first
 * tool call as well as at startup.
 *
 * @module server/state
 */

import { loadPipelineConfig, type PipelineConfigOverrides } from '../services/config.js';
import { createRagRuntime, type RagRuntime, type RuntimeOverrides } from '../services/runtime.js';
import type { ServerState } from './types.js';

export const state: ServerState = {
  runtime: null,
  configOverrides: {},
  runtimeOverrides: {},
};

/**
 * Get the runtime, creating it on first call
 *
 * @throws ConfigurationError if the environment is invalid
 * @throws DatabaseError if the database cannot be opened
 */
export function requireRuntime(): RagRuntime {
  if (!state.runtime) {
    const config = loadPipelineConfig(state.configOverrides);
    state.runtime = createRagRuntime(config, state.runtimeOverrides);
  }
  return state.runtime;
}

/**
 * Install a ready-made runtime, closing any previous one
 */
export function setRuntime(runtime: RagRuntime): void {
  if (state.runtime && state.runtime !== runtime) {
    state.runtime.close();
  }
  state.runtime = runtime;
}

/**
 * Set config and provider overrides for the next runtime created
 */
export function configureRuntime(
  configOverrides: PipelineConfigOverrides,
  runtimeOverrides: RuntimeOverrides = {}
): void {
  state.configOverrides = configOverrides;
  state.runtimeOverrides = runtimeOverrides;
}

/**
 * Close the runtime and clear all state
 */
export function resetState(): void {
  state.runtime?.close();
  state.runtime = null;
  state.configOverrides = {};
  state.runtimeOverrides = {};
}
