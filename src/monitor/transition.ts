import type { Severity } from '../types/index.js';

/**
 * What the loop does with one fresh verdict:
 * - `ignore`:   unknown verdict, stored state untouched, no alert
 * - `alert`:    edge into error, deliver then store error
 * - `suppress`: error persists, no alert
 * - `record`:   normal/warning, store it (re-arms the error edge)
 */
export type TransitionDecision =
  | { action: 'ignore' }
  | { action: 'alert'; next: 'error' }
  | { action: 'suppress'; next: 'error' }
  | { action: 'record'; next: 'normal' | 'warning' };

/**
 * Edge-triggered decision. `previous` is undefined before the first
 * observation, which counts as non-error.
 */
export function decideTransition(previous: Severity | undefined, current: Severity): TransitionDecision {
  switch (current) {
    case 'unknown':
      return { action: 'ignore' };
    case 'error':
      return previous === 'error' ? { action: 'suppress', next: 'error' } : { action: 'alert', next: 'error' };
    case 'normal':
    case 'warning':
      return { action: 'record', next: current };
  }
}
