export {
  Orchestrator,
  createOrchestrator,
  buildIdempotencyKey,
  isSettled,
  type OrchestratorDeps,
} from './orchestrator.js';
export {
  RetryPolicyEngine,
  createRetryPolicyEngine,
  classifyError,
  DEFAULT_RETRY_POLICY,
  NO_RETRY_POLICY,
  type RetryPolicy,
  type RetryResult,
  type RetrySuccess,
  type RetryFailure,
  type RetryAttempt,
  type ErrorClass,
  type ErrorClassifier,
  type ExecuteOptions,
  type RetryPolicyEngineDeps,
} from './retry-policy.js';
export {
  StatusLedger,
  InvalidTransitionError,
  PHASE_COMPLETION_STATUS,
  canTransition,
  getProgressDescription,
  isPhaseStatus,
  isTerminalStatus,
  nextPhase,
} from './status-ledger.js';
