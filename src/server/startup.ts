/**
 * Startup Validation
 *
 * Loads the pipeline configuration once at startup so an invalid
 * environment fails fast, and warns about providers that will not work.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { describeConfig, loadPipelineConfig, type PipelineConfig } from '../services/config.js';
import { state } from './state.js';

/**
 * @throws ConfigurationError listing every invalid setting
 */
export function validateStartupDependencies(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const config = loadPipelineConfig(state.configOverrides, env);
  const warnings: string[] = [];

  if (config.embedding.provider === 'hashing') {
    warnings.push(
      'EMBEDDING_PROVIDER=hashing uses feature-hashing vectors. Retrieval quality is lower than sentence-transformers.'
    );
  }
  if (config.generation.provider === 'ollama') {
    warnings.push(
      `Answers need an Ollama server at ${config.generation.ollamaBaseUrl} with model "${config.generation.model}" pulled.`
    );
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  console.error(`[Config] ${describeConfig(config)}`);
  return config;
}
