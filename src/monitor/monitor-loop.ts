/**
 * MONITOR LOOP - fetch, classify, compare, alert, store
 *
 * One worker drives one authenticated session. Entities are checked one
 * after another inside a cycle because the session must never serve two
 * fetches at once. Each entity has its own edge-triggered state machine:
 * an alert goes out only on the step from non-error (or never observed)
 * into error, and unknown verdicts leave the stored state alone.
 *
 * Cancellation is honored at every suspension point (fetch, delivery,
 * inter-cycle sleep). The session is closed on every exit path.
 */

import type { Alert, Entity, Result, Severity, Verdict } from '../types/index.js';
import { ok, err, isErr, isOk } from '../types/index.js';
import type { EventBus } from '../kernel/event-bus.js';
import { createLogger, formatError } from '../utils/logger.js';
import type { AlertSink, DeliveryOutcome, Session, SessionGateway } from './contracts.js';
import { AuthError, DeliveryError, FetchError, describeError, isCancelled } from './errors.js';
import { EntityStateStore } from './entity-state-store.js';
import { StatusClassifier, checkFailedVerdict } from './status-classifier.js';
import { decideTransition } from './transition.js';
import { abortable, sleep, throwIfAborted } from './abortable.js';

const log = createLogger('monitor-loop');

export const ERROR_STATUS_LABEL = 'Error';

// ─── Types ──────────────────────────────────────────────────────────────────

export type AlertOutcome = 'none' | 'suppressed' | 'delivered' | 'disabled' | 'failed';

export interface EntityCheckResult {
  entity: Entity;
  verdict: Verdict;
  previous: Severity | undefined;
  /** Stored severity after this check */
  stored: Severity | undefined;
  alert: AlertOutcome;
  /** Why the verdict is unknown, or why delivery failed */
  error?: string;
}

export interface CycleReport {
  cycle: number;
  startedAt: Date;
  finishedAt: Date;
  results: EntityCheckResult[];
}

export interface RunSummary {
  reason: 'completed' | 'cancelled';
  cycles: number;
  lastReport: CycleReport | null;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Run exactly one cycle, then release the session */
  once?: boolean;
}

export interface MonitorLoopOptions {
  gateway: SessionGateway;
  sink: AlertSink;
  entities: readonly Entity[];
  intervalMs: number;
  classifier?: StatusClassifier;
  store?: EntityStateStore;
  eventBus?: EventBus;
  now?: () => Date;
}

// ─── Loop ───────────────────────────────────────────────────────────────────

export class MonitorLoop {
  private readonly gateway: SessionGateway;
  private readonly sink: AlertSink;
  private readonly entities: readonly Entity[];
  private readonly intervalMs: number;
  private readonly classifier: StatusClassifier;
  private readonly store: EntityStateStore;
  private readonly eventBus: EventBus | undefined;
  private readonly now: () => Date;
  private cycles = 0;
  private cycleInFlight = false;

  constructor(options: MonitorLoopOptions) {
    if (!(options.intervalMs > 0)) {
      throw new Error(`intervalMs must be positive, got ${options.intervalMs}`);
    }
    this.gateway = options.gateway;
    this.sink = options.sink;
    this.entities = [...options.entities];
    this.intervalMs = options.intervalMs;
    this.now = options.now ?? (() => new Date());
    this.classifier = options.classifier ?? new StatusClassifier({ now: this.now });
    this.store = options.store ?? new EntityStateStore();
    this.eventBus = options.eventBus;
  }

  getStore(): EntityStateStore {
    return this.store;
  }

  getCycleCount(): number {
    return this.cycles;
  }

  /**
   * Authenticate, run cycles until cancelled (or once), then close the
   * session. Authentication failure is returned, not thrown; cancellation
   * ends the run normally with reason `cancelled`.
   */
  async run(options: RunOptions = {}): Promise<Result<RunSummary, AuthError>> {
    const { signal, once = false } = options;
    let lastReport: CycleReport | null = null;
    let cyclesThisRun = 0;
    let reason: RunSummary['reason'] = 'completed';

    try {
      throwIfAborted(signal);
      const auth = await abortable(this.authenticate(), signal);
      if (isErr(auth)) {
        log.error({ err: formatError(auth.error) }, 'Authentication failed, monitor not started');
        this.emitStopped('auth_failed', cyclesThisRun);
        return err(auth.error);
      }
      const session = auth.data;

      log.info(
        {
          entities: this.entities.map((entity) => `${entity.displayName} (${entity.dashboardRef})`),
          intervalMs: this.intervalMs,
          once,
        },
        'Monitor started',
      );
      this.eventBus?.emit('monitor:started', {
        entityCount: this.entities.length,
        intervalMs: this.intervalMs,
        timestamp: this.now(),
      });

      for (;;) {
        lastReport = await this.runCycle(session, signal);
        cyclesThisRun++;
        if (once) break;
        log.debug({ intervalMs: this.intervalMs }, 'Sleeping until next cycle');
        await sleep(this.intervalMs, signal);
      }
    } catch (error) {
      if (!isCancelled(error)) {
        log.error({ err: formatError(error) }, 'Monitor loop failed');
        this.emitStopped('failed', cyclesThisRun);
        throw error;
      }
      log.info({ cycles: cyclesThisRun }, 'Cancellation received, shutting down');
      reason = 'cancelled';
    } finally {
      await this.releaseSession();
    }

    this.emitStopped(reason, cyclesThisRun);
    return ok({ reason, cycles: cyclesThisRun, lastReport });
  }

  /**
   * One full pass over every entity, in configuration order.
   */
  async runCycle(session: Session, signal?: AbortSignal): Promise<CycleReport> {
    if (this.cycleInFlight) {
      throw new Error('cycle already running');
    }
    this.cycleInFlight = true;

    try {
      const cycle = ++this.cycles;
      const startedAt = this.now();
      const started = Date.now();
      log.info({ cycle }, 'Cycle started');
      this.eventBus?.emit('monitor:cycle_started', { cycle, startedAt });

      const results: EntityCheckResult[] = [];
      for (const entity of this.entities) {
        throwIfAborted(signal);
        const result = await this.checkEntity(session, entity, signal);
        results.push(result);
        this.eventBus?.emit('monitor:entity_checked', {
          cycle,
          entityId: entity.id,
          displayName: entity.displayName,
          severity: result.verdict.severity,
          previous: result.previous,
          summary: result.verdict.summary,
          alert: result.alert,
        });
      }

      const report: CycleReport = { cycle, startedAt, finishedAt: this.now(), results };
      const alerts = results.filter((r) => r.alert === 'delivered' || r.alert === 'failed' || r.alert === 'disabled').length;
      const unknown = results.filter((r) => r.verdict.severity === 'unknown').length;
      const duration = Date.now() - started;

      this.eventBus?.emit('monitor:cycle_complete', { cycle, checked: results.length, alerts, unknown, duration });
      log.info({ cycle, checked: results.length, alerts, unknown, duration }, 'Cycle complete');
      return report;
    } finally {
      this.cycleInFlight = false;
    }
  }

  // ── Per-entity state machine ────────────────────────────────────────────

  private async checkEntity(session: Session, entity: Entity, signal: AbortSignal | undefined): Promise<EntityCheckResult> {
    const previous = this.store.get(entity.id);
    const observation = await this.observe(session, entity, signal);
    const { verdict } = observation;
    const decision = decideTransition(previous, verdict.severity);

    const base = { entity, verdict, previous, ...(observation.error ? { error: observation.error } : {}) };

    switch (decision.action) {
      case 'ignore':
        log.warn({ entityId: entity.id, previous, error: observation.error }, 'Check failed, keeping previous state');
        return { ...base, stored: previous, alert: 'none' };

      case 'suppress':
        log.info({ entityId: entity.id, summary: verdict.summary }, 'Error state persists, alert suppressed');
        return { ...base, stored: 'error', alert: 'suppressed' };

      case 'record':
        if (previous === 'error') {
          log.info({ entityId: entity.id, severity: decision.next }, 'Entity recovered from error');
        }
        this.store.set(entity.id, decision.next, verdict.observedAt);
        return { ...base, stored: decision.next, alert: 'none' };

      case 'alert': {
        log.warn({ entityId: entity.id, previous, summary: verdict.summary }, 'New error state detected, sending alert');
        const alert = this.buildAlert(session, entity);
        // committed even when delivery fails or is cancelled: at most one
        // alert per contiguous error run
        const delivery = await abortable(this.deliver(alert), signal).finally(() => {
          this.store.set(entity.id, 'error', verdict.observedAt);
        });

        if (isErr(delivery)) {
          log.error({ entityId: entity.id, err: formatError(delivery.error) }, 'Alert delivery failed');
          this.eventBus?.emit('monitor:alert_failed', { entityId: entity.id, alert, error: delivery.error.message });
          return { ...base, stored: 'error', alert: 'failed', error: delivery.error.message };
        }

        if (delivery.data.status === 'disabled') {
          log.warn({ entityId: entity.id, reason: delivery.data.reason }, 'Alert channel disabled, alert not sent');
          return { ...base, stored: 'error', alert: 'disabled' };
        }

        this.eventBus?.emit('monitor:alert_fired', { entityId: entity.id, alert });
        return { ...base, stored: 'error', alert: 'delivered' };
      }
    }
  }

  /**
   * Fetch and classify. Any fetch or classification failure becomes an
   * unknown verdict; cancellation propagates.
   */
  private async observe(
    session: Session,
    entity: Entity,
    signal: AbortSignal | undefined,
  ): Promise<{ verdict: Verdict; error?: string }> {
    const fetched = await abortable(this.fetch(session, entity), signal);
    if (isErr(fetched)) {
      return { verdict: checkFailedVerdict(this.now()), error: fetched.error.message };
    }

    const classified = this.classifier.tryClassify(fetched.data);
    if (isOk(classified)) {
      log.debug({ entityId: entity.id, summary: classified.data.summary }, 'Entity classified');
      return { verdict: classified.data };
    }
    return { verdict: checkFailedVerdict(this.now()), error: classified.error.message };
  }

  private buildAlert(session: Session, entity: Entity): Alert {
    return {
      entityDisplayName: entity.displayName,
      dashboardURL: session.dashboardUrl(entity.dashboardRef),
      statusLabel: ERROR_STATUS_LABEL,
      firedAt: this.now(),
    };
  }

  // ── Collaborator calls (throws become typed errors) ─────────────────────

  private async authenticate(): Promise<Result<Session, AuthError>> {
    try {
      return await this.gateway.authenticate();
    } catch (error) {
      return err(new AuthError(`Authentication threw: ${describeError(error)}`, { cause: error }));
    }
  }

  private async fetch(session: Session, entity: Entity): Promise<Result<unknown, FetchError>> {
    try {
      return await session.fetchEntityFragment(entity.dashboardRef);
    } catch (error) {
      return err(new FetchError(`Fetch threw for ${entity.id}: ${describeError(error)}`, { cause: error }));
    }
  }

  private async deliver(alert: Alert): Promise<Result<DeliveryOutcome, DeliveryError>> {
    try {
      return await this.sink.deliver(alert);
    } catch (error) {
      return err(new DeliveryError(`Delivery threw: ${describeError(error)}`, { cause: error }));
    }
  }

  private async releaseSession(): Promise<void> {
    try {
      await this.gateway.close();
      log.info('Session released');
    } catch (error) {
      log.error({ err: formatError(error) }, 'Failed to release session');
    }
  }

  private emitStopped(reason: 'cancelled' | 'completed' | 'auth_failed' | 'failed', cycles: number): void {
    this.eventBus?.emit('monitor:stopped', { reason, cycles, timestamp: this.now() });
  }
}
