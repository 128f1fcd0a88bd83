export {
  MonitorLoop,
  ERROR_STATUS_LABEL,
  type AlertOutcome,
  type CycleReport,
  type EntityCheckResult,
  type MonitorLoopOptions,
  type RunOptions,
  type RunSummary,
} from './monitor-loop.js';
export {
  StatusClassifier,
  normalizeColor,
  countIndicators,
  checkFailedVerdict,
  summarize,
  DEFAULT_ERROR_COLOR,
  DEFAULT_WARNING_COLOR,
  DEFAULT_NORMAL_COLOR,
  type ClassifierOptions,
} from './status-classifier.js';
export { EntityStateStore, type EntityState } from './entity-state-store.js';
export { decideTransition, type TransitionDecision } from './transition.js';
export { abortable, sleep, throwIfAborted } from './abortable.js';
export type { AlertSink, DeliveryOutcome, Session, SessionGateway } from './contracts.js';
export {
  MonitorError,
  AuthError,
  FetchError,
  ClassificationError,
  DeliveryError,
  CancelledError,
  isCancelled,
  describeError,
  type MonitorErrorKind,
} from './errors.js';
