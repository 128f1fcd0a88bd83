import type { Alert, Result, StatusFragment } from '../types/index.js';
import type { AuthError, DeliveryError, FetchError } from './errors.js';

/**
 * An authenticated dashboard session. One caller at a time: the loop
 * serializes every fetch that goes through the same session.
 */
export interface Session {
  fetchEntityFragment(dashboardRef: string): Promise<Result<StatusFragment, FetchError>>;
  /** Human-facing URL of an entity's dashboard, used in alerts. */
  dashboardUrl(dashboardRef: string): string;
}

export interface SessionGateway {
  /** Must succeed once before any fetch. */
  authenticate(): Promise<Result<Session, AuthError>>;
  /** Release the browser/session. Safe to call more than once. */
  close(): Promise<void>;
}

export type DeliveryOutcome = { status: 'delivered' } | { status: 'disabled'; reason: string };

export interface AlertSink {
  deliver(alert: Alert): Promise<Result<DeliveryOutcome, DeliveryError>>;
}
