/**
 * Failure taxonomy for the monitor.
 *
 * - AuthError: no session could be established. Fatal to the run.
 * - FetchError / ClassificationError: one entity, one cycle. The verdict
 *   degrades to unknown and the loop carries on.
 * - DeliveryError: the alert channel failed. Logged; state still commits.
 * - CancelledError: shutdown was requested at a suspension point.
 */

export type MonitorErrorKind = 'auth' | 'fetch' | 'classification' | 'delivery' | 'cancelled';

export abstract class MonitorError extends Error {
  abstract readonly kind: MonitorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AuthError extends MonitorError {
  readonly kind = 'auth' as const;
}

export class FetchError extends MonitorError {
  readonly kind = 'fetch' as const;
}

export class ClassificationError extends MonitorError {
  readonly kind = 'classification' as const;
}

export class DeliveryError extends MonitorError {
  readonly kind = 'delivery' as const;
}

export class CancelledError extends MonitorError {
  readonly kind = 'cancelled' as const;

  constructor(message = 'Monitor cancelled', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isCancelled(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
