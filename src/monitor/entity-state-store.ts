import type { Severity } from '../types/index.js';

export interface EntityState {
  entityId: string;
  lastSeverity: Severity;
  updatedAt: Date;
}

/**
 * Last observed severity per entity, kept in memory for the life of the
 * process. Entries appear on first observation and are never evicted, so a
 * restart forgets history and may alert again on a standing error.
 */
export class EntityStateStore {
  private readonly states = new Map<string, EntityState>();

  get(entityId: string): Severity | undefined {
    return this.states.get(entityId)?.lastSeverity;
  }

  set(entityId: string, severity: Severity, at: Date = new Date()): void {
    this.states.set(entityId, { entityId, lastSeverity: severity, updatedAt: at });
  }

  has(entityId: string): boolean {
    return this.states.has(entityId);
  }

  get size(): number {
    return this.states.size;
  }

  /** Copy of every entry, for reporting. */
  snapshot(): EntityState[] {
    return Array.from(this.states.values(), (state) => ({ ...state }));
  }
}
