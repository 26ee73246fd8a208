/**
 * Builds the runtime components from a loaded configuration.
 */

import type { PostlineConfig, RetryConfig } from './config/index.js';
import type { ContentGenerator, Publisher, RecordStore } from './types/adapters.js';
import { Orchestrator } from './orchestrator/orchestrator.js';
import {
  RetryPolicyEngine,
  type RetryPolicy,
  type RetryPolicyEngineDeps,
} from './orchestrator/retry-policy.js';
import { StatusLedger } from './orchestrator/status-ledger.js';
import { FileRecordStore } from './store/file-record-store.js';
import { OutboxPublisher } from './publisher/outbox-publisher.js';
import { createOpenAIGenerator } from './generator/openai-generator.js';
import { loadTemplate, validateTemplate } from './generator/prompt-template.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('pipeline');

export interface PipelineOverrides {
  store?: RecordStore;
  generator?: ContentGenerator;
  publisher?: Publisher;
  /** Used instead of reading `templatePath` */
  template?: string;
  retryDeps?: RetryPolicyEngineDeps;
}

export interface Pipeline {
  store: RecordStore;
  ledger: StatusLedger;
  orchestrator: Orchestrator;
}

export function toRetryPolicy(retry: RetryConfig): RetryPolicy {
  return {
    maxAttempts: retry.maxAttempts,
    backoffMs: retry.backoffMs,
    backoffMultiplier: retry.backoffMultiplier,
    maxBackoffMs: retry.maxBackoffMs,
    jitter: retry.jitter,
    timeoutMs: retry.phaseTimeoutMs,
  };
}

export function createRecordStore(config: PostlineConfig): FileRecordStore {
  return new FileRecordStore({
    dataDir: config.dataDir,
    lockTimeoutMs: config.lockTimeoutMs,
  });
}

export function createPublisher(config: PostlineConfig): OutboxPublisher {
  return new OutboxPublisher({
    outboxDir: config.outboxDir,
    ...(config.outboxPublicUrl !== undefined ? { publicBaseUrl: config.outboxPublicUrl } : {}),
  });
}

/**
 * Wire store, generator, publisher and retry engine into an orchestrator.
 */
export async function createPipeline(
  config: PostlineConfig,
  overrides: PipelineOverrides = {}
): Promise<Pipeline> {
  const store = overrides.store ?? createRecordStore(config);
  const template = overrides.template ?? (await loadTemplate(config.templatePath));
  validateTemplate(template);

  const generator = overrides.generator ?? createOpenAIGenerator(config.openai);
  const publisher = overrides.publisher ?? createPublisher(config);
  const retry = new RetryPolicyEngine(toRetryPolicy(config.retry), overrides.retryDeps);
  const ledger = new StatusLedger(store);

  log.debug(
    { dataDir: config.dataDir, outboxDir: config.outboxDir, maxAttempts: config.retry.maxAttempts },
    'Pipeline ready'
  );

  return {
    store,
    ledger,
    orchestrator: new Orchestrator({ store, generator, publisher, template, retry, ledger }),
  };
}
