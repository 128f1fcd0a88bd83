import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MonitorLoop } from '../../../src/monitor/monitor-loop.js';
import { StatusClassifier } from '../../../src/monitor/status-classifier.js';
import { EntityStateStore } from '../../../src/monitor/entity-state-store.js';
import { AuthError } from '../../../src/monitor/errors.js';
import { EventBus } from '../../../src/kernel/event-bus.js';
import type { Result, Verdict } from '../../../src/types/index.js';
import type { ClassificationError } from '../../../src/monitor/errors.js';
import {
  FakeGateway,
  RecordingSink,
  ScriptedSession,
  entity,
  errorFragment,
  malformedFragment,
  normalFragment,
  step,
  warningFragment,
} from '../../helpers/fakes.js';

const FIXED = new Date('2026-03-01T08:00:00Z');

describe('MonitorLoop', () => {
  let session: ScriptedSession;
  let gateway: FakeGateway;
  let sink: RecordingSink;
  let store: EntityStateStore;
  let eventBus: EventBus;

  function createLoop(entities = [entity('A')], intervalMs = 60_000, classifier?: StatusClassifier): MonitorLoop {
    return new MonitorLoop({
      gateway,
      sink,
      entities,
      intervalMs,
      store,
      eventBus,
      now: () => FIXED,
      ...(classifier ? { classifier } : {}),
    });
  }

  beforeEach(() => {
    session = new ScriptedSession();
    gateway = new FakeGateway(session);
    sink = new RecordingSink();
    store = new EntityStateStore();
    eventBus = new EventBus();
  });

  describe('edge-triggered alerting', () => {
    it('alerts once per error run across the documented six-cycle scenario', async () => {
      session.push(
        'A',
        step.ok(normalFragment()),
        step.ok(errorFragment(2)),
        step.ok(errorFragment(2)),
        step.fail('fetch failed'),
        step.ok(normalFragment()),
        step.ok(errorFragment(1)),
      );
      const loop = createLoop();

      const c1 = await loop.runCycle(session);
      expect(sink.attempts).toHaveLength(0);
      expect(store.get('A')).toBe('normal');
      expect(c1.results[0]?.alert).toBe('none');

      const c2 = await loop.runCycle(session);
      expect(sink.attempts).toHaveLength(1);
      expect(store.get('A')).toBe('error');
      expect(c2.results[0]?.alert).toBe('delivered');
      expect(c2.results[0]?.verdict.errorCount).toBe(2);

      const c3 = await loop.runCycle(session);
      expect(sink.attempts).toHaveLength(1);
      expect(store.get('A')).toBe('error');
      expect(c3.results[0]?.alert).toBe('suppressed');

      const c4 = await loop.runCycle(session);
      expect(sink.attempts).toHaveLength(1);
      expect(store.get('A')).toBe('error');
      expect(c4.results[0]?.verdict.severity).toBe('unknown');
      expect(c4.results[0]?.error).toBe('fetch failed');

      await loop.runCycle(session);
      expect(sink.attempts).toHaveLength(1);
      expect(store.get('A')).toBe('normal');

      const c6 = await loop.runCycle(session);
      expect(sink.attempts).toHaveLength(2);
      expect(c6.results[0]?.verdict.errorCount).toBe(1);
      expect(loop.getCycleCount()).toBe(6);
    });

    it('alerts on the first ever observation of error', async () => {
      session.push('A', step.ok(errorFragment()));
      const loop = createLoop();

      const report = await loop.runCycle(session);

      expect(report.results[0]?.previous).toBeUndefined();
      expect(report.results[0]?.alert).toBe('delivered');
      expect(sink.attempts).toHaveLength(1);
    });

    it('builds the alert from the entity and the session dashboard URL', async () => {
      session.push('A', step.ok(errorFragment()));
      const loop = createLoop([entity('A', 'Core switch')]);

      await loop.runCycle(session);

      expect(sink.attempts[0]).toEqual({
        entityDisplayName: 'Core switch',
        dashboardURL: 'https://dashboard.test/mapshow.htm?id=A',
        statusLabel: 'Error',
        firedAt: FIXED,
      });
    });

    it('re-arms after a warning', async () => {
      session.push('A', step.ok(errorFragment()), step.ok(warningFragment()), step.ok(errorFragment()));
      const loop = createLoop();

      await loop.runCycle(session);
      await loop.runCycle(session);
      expect(store.get('A')).toBe('warning');
      await loop.runCycle(session);

      expect(sink.attempts).toHaveLength(2);
    });

    it('does not let unknown verdicts set or clear state', async () => {
      session.push('A', step.fail(), step.ok(errorFragment()), step.throws('page crashed'), step.ok(malformedFragment()));
      const loop = createLoop();

      const first = await loop.runCycle(session);
      expect(first.results[0]?.verdict.severity).toBe('unknown');
      expect(store.has('A')).toBe(false);

      await loop.runCycle(session);
      expect(store.get('A')).toBe('error');

      const thrown = await loop.runCycle(session);
      expect(thrown.results[0]?.verdict.summary).toBe('check failed');
      expect(thrown.results[0]?.error).toBe('Fetch threw for A: page crashed');

      const malformed = await loop.runCycle(session);
      expect(malformed.results[0]?.verdict.severity).toBe('unknown');
      expect(malformed.results[0]?.stored).toBe('error');

      expect(store.get('A')).toBe('error');
      expect(sink.attempts).toHaveLength(1);
    });

    it('evaluates each entity independently', async () => {
      session.push('A', step.ok(errorFragment()), step.ok(errorFragment()));
      session.push('B', step.fail(), step.ok(errorFragment()));
      const loop = createLoop([entity('A'), entity('B')]);

      await loop.runCycle(session);
      expect(sink.attempts.map((a) => a.entityDisplayName)).toEqual(['Server A']);

      await loop.runCycle(session);
      expect(sink.attempts.map((a) => a.entityDisplayName)).toEqual(['Server A', 'Server B']);
    });

    it('fetches entities one at a time in configuration order', async () => {
      session.push('A', step.ok(normalFragment()));
      session.push('B', step.ok(normalFragment()));
      session.push('C', step.ok(normalFragment()));
      const loop = createLoop([entity('A'), entity('B'), entity('C')]);

      await loop.runCycle(session);

      expect(session.calls).toEqual(['A', 'B', 'C']);
      expect(session.maxActive).toBe(1);
    });

    it('refuses a second cycle while one is in flight', async () => {
      session.push('A', step.ok(normalFragment()));
      const loop = createLoop();

      const first = loop.runCycle(session);
      await expect(loop.runCycle(session)).rejects.toThrow('cycle already running');
      await first;
    });
  });

  describe('delivery failures', () => {
    it('commits error state when delivery fails and does not retry', async () => {
      sink.mode = 'fail';
      session.push('A', step.ok(errorFragment()), step.ok(errorFragment()));
      const loop = createLoop();
      const failed = vi.fn();
      eventBus.on('monitor:alert_failed', failed);

      const first = await loop.runCycle(session);
      expect(first.results[0]?.alert).toBe('failed');
      expect(first.results[0]?.error).toBe('smtp unavailable');
      expect(store.get('A')).toBe('error');
      expect(failed).toHaveBeenCalledTimes(1);

      const second = await loop.runCycle(session);
      expect(second.results[0]?.alert).toBe('suppressed');
      expect(sink.attempts).toHaveLength(1);
    });

    it('treats a throwing sink as a failed delivery', async () => {
      sink.mode = 'throw';
      session.push('A', step.ok(errorFragment()));
      const loop = createLoop();

      const report = await loop.runCycle(session);

      expect(report.results[0]?.alert).toBe('failed');
      expect(report.results[0]?.error).toBe('Delivery threw: socket closed');
      expect(store.get('A')).toBe('error');
    });

    it('records a disabled channel without retrying later', async () => {
      sink.mode = 'disabled';
      session.push('A', step.ok(errorFragment()), step.ok(errorFragment()));
      const loop = createLoop();

      const first = await loop.runCycle(session);
      await loop.runCycle(session);

      expect(first.results[0]?.alert).toBe('disabled');
      expect(sink.attempts).toHaveLength(1);
    });
  });

  describe('events', () => {
    it('emits entity, alert and cycle events', async () => {
      session.push('A', step.ok(errorFragment(3)));
      const loop = createLoop();
      const checked = vi.fn();
      const fired = vi.fn();
      const complete = vi.fn();
      eventBus.on('monitor:entity_checked', checked);
      eventBus.on('monitor:alert_fired', fired);
      eventBus.on('monitor:cycle_complete', complete);

      await loop.runCycle(session);

      expect(checked).toHaveBeenCalledWith({
        cycle: 1,
        entityId: 'A',
        displayName: 'Server A',
        severity: 'error',
        previous: undefined,
        summary: 'Error (3)',
        alert: 'delivered',
      });
      expect(fired).toHaveBeenCalledWith({ entityId: 'A', alert: sink.attempts[0] });
      expect(complete).toHaveBeenCalledWith(expect.objectContaining({ cycle: 1, checked: 1, alerts: 1, unknown: 0 }));
    });
  });

  describe('run', () => {
    it('runs one cycle in once mode and releases the session', async () => {
      session.push('A', step.ok(normalFragment()));
      const loop = createLoop();

      const result = await loop.run({ once: true });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.reason).toBe('completed');
        expect(result.data.cycles).toBe(1);
        expect(result.data.lastReport?.results[0]?.verdict.severity).toBe('normal');
      }
      expect(gateway.authenticateCalls).toBe(1);
      expect(gateway.closeCalls).toBe(1);
    });

    it('completes a once run even when fetches fail', async () => {
      session.push('A', step.fail());
      const loop = createLoop();

      const result = await loop.run({ once: true });

      expect(result.success).toBe(true);
      expect(gateway.closeCalls).toBe(1);
    });

    it('returns AuthError without fetching when login is rejected', async () => {
      gateway.authMode = 'reject';
      const stopped = vi.fn();
      eventBus.on('monitor:stopped', stopped);
      const loop = createLoop();

      const result = await loop.run({ once: true });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(AuthError);
        expect(result.error.message).toBe('bad credentials');
      }
      expect(session.calls).toEqual([]);
      expect(gateway.closeCalls).toBe(1);
      expect(stopped).toHaveBeenCalledWith(expect.objectContaining({ reason: 'auth_failed', cycles: 0 }));
    });

    it('wraps a throwing authenticate into AuthError', async () => {
      gateway.authMode = 'throw';
      const loop = createLoop();

      const result = await loop.run();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Authentication threw: browser crashed');
      }
      expect(gateway.closeCalls).toBe(1);
    });

    it('stops during the inter-cycle sleep when cancelled', async () => {
      session.push('A', step.ok(normalFragment()), step.ok(normalFragment()));
      const controller = new AbortController();
      eventBus.on('monitor:cycle_complete', () => controller.abort());
      const stopped = vi.fn();
      eventBus.on('monitor:stopped', stopped);
      const loop = createLoop([entity('A')], 60_000);

      const result = await loop.run({ signal: controller.signal });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.reason).toBe('cancelled');
        expect(result.data.cycles).toBe(1);
      }
      expect(session.calls).toEqual(['A']);
      expect(gateway.closeCalls).toBe(1);
      expect(stopped).toHaveBeenCalledWith(expect.objectContaining({ reason: 'cancelled', cycles: 1 }));
    });

    it('interrupts a fetch that never returns', async () => {
      session.push('A', step.hang());
      const controller = new AbortController();
      session.onHang = () => controller.abort();
      const loop = createLoop();

      const result = await loop.run({ signal: controller.signal });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.reason).toBe('cancelled');
        expect(result.data.cycles).toBe(0);
      }
      expect(store.has('A')).toBe(false);
      expect(gateway.closeCalls).toBe(1);
    });

    it('interrupts a delivery that never returns and keeps the error state', async () => {
      sink.mode = 'hang';
      session.push('A', step.ok(errorFragment()));
      const controller = new AbortController();
      sink.onHang = () => controller.abort();
      const loop = createLoop();

      const result = await loop.run({ signal: controller.signal });

      expect(result.success).toBe(true);
      expect(store.get('A')).toBe('error');
      expect(gateway.closeCalls).toBe(1);
    });

    it('does not authenticate when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const loop = createLoop();

      const result = await loop.run({ signal: controller.signal });

      expect(result.success).toBe(true);
      expect(gateway.authenticateCalls).toBe(0);
      expect(gateway.closeCalls).toBe(1);
    });

    it('releases the session when a cycle fails unexpectedly', async () => {
      class ExplodingClassifier extends StatusClassifier {
        override tryClassify(): Result<Verdict, ClassificationError> {
          throw new Error('classifier bug');
        }
      }
      session.push('A', step.ok(normalFragment()));
      const stopped = vi.fn();
      eventBus.on('monitor:stopped', stopped);
      const loop = createLoop([entity('A')], 60_000, new ExplodingClassifier());

      await expect(loop.run({ once: true })).rejects.toThrow('classifier bug');
      expect(gateway.closeCalls).toBe(1);
      expect(stopped).toHaveBeenCalledWith(expect.objectContaining({ reason: 'failed' }));
    });
  });

  it('rejects a non-positive interval', () => {
    expect(() => createLoop([entity('A')], 0)).toThrow('intervalMs must be positive, got 0');
  });
});
