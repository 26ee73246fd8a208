/**
 * Postline Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Orchestrator (main entry point)
export * from './orchestrator/index.js';

// Adapters
export * from './store/index.js';
export * from './generator/index.js';
export * from './publisher/index.js';

// Wiring
export {
  createPipeline,
  createRecordStore,
  createPublisher,
  toRetryPolicy,
  type Pipeline,
  type PipelineOverrides,
} from './pipeline.js';

// Configuration
export {
  loadConfig,
  getConfig,
  resetConfig,
  type PostlineConfig,
  type RetryConfig,
  type OpenAIConfig,
} from './config/index.js';

// Control plane
export { ExitCode, exitCodeFor } from './control-plane/exit-codes.js';

// Utilities
export { createLogger } from './utils/logger.js';
