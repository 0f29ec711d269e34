/* ScopedStateStore
 *
 * Process-wide table of saved original values for one state domain (for example
 * `environment`). Every external write a test unit performs goes through apply(),
 * and every write is undone by restoreAll(), so all mutations are auditable and
 * reversible.
 *
 * Model:
 *  - One store per domain and backing store, shared through globalThis (see forDomain())
 *  - Entries are grouped by unit; a unit owns the entries it applied
 *  - Within a unit a key may have at most one live entry; a second apply() for the
 *    same key is a ConflictError, never a silent overwrite
 *  - restoreAll() unwinds in strict reverse application order (LIFO) and attempts
 *    every entry even when one of them fails
 *
 * Nesting across units:
 * ```typescript
 * const env = ScopedStateStore.forDomain('environment', new ProcessEnvironmentStore());
 * env.apply(classUnit, 'FOO', 'outer');   // FOO: unset → outer
 * env.apply(methodUnit, 'FOO', 'inner');  // FOO: outer → inner
 * env.restoreAll(methodUnit);              // FOO: outer
 * env.restoreAll(classUnit);               // FOO: unset
 * ```
 */

import { ConflictError, RestorationError } from '../errors/errors.js';
import { logger } from '../logging/logger.js';
import { UNSET, type ExternalValue } from '../types/types.js';
import { DomainLock } from './domain-lock.js';
import { writeValue, type ExternalKeyValueStore } from './external-store.js';

const log = logger('state');
const warn = log.extend('warn');

/**
 * Branded identifier of one test unit's execution window.
 */
export type UnitId = string & { __brand: 'UnitId' };

let _unitCounter = 0;

/**
 * Mint a fresh unit identifier (unit_1, unit_2, ...).
 */
export function nextUnitId(): UnitId {
  return `unit_${++_unitCounter}` as UnitId;
}

/**
 * Restoration record for one externally mutated key.
 */
export interface SavedEntry {
  readonly key: string;
  /** Value before apply(), or UNSET if the key was absent */
  readonly priorValue: ExternalValue;
  /** Value apply() wrote; used to detect drift at restore time */
  readonly appliedValue: ExternalValue;
  /** Position in the unit's application order, starting at 0 */
  readonly depth: number;
  /** Annotation that caused the write, for diagnostics */
  readonly source?: string;
}

/**
 * Opaque reference to a live SavedEntry.
 */
export interface SavedEntryHandle {
  readonly unitId: UnitId;
  readonly domain: string;
  readonly key: string;
  readonly depth: number;
}

export interface RestoreReport {
  readonly domain: string;
  /** Keys restored, in restoration order */
  readonly restored: string[];
  /** Keys whose value changed between apply() and restore */
  readonly drifted: string[];
}

/**
 * Stores of one domain, one per backing store. `current` is the store most
 * recently requested with a backing.
 */
type DomainStores = {
  byBacking: Map<ExternalKeyValueStore, ScopedStateStore>;
  current: ScopedStateStore;
};

/**
 * Global symbol for the store table on globalThis, so the module being loaded
 * twice still yields one store (and one lock) per domain and backing.
 */
const GLOBAL_SYMBOL = Symbol.for('pinion.scopedStateStores');

type GlobalWithStores = typeof globalThis & { [GLOBAL_SYMBOL]?: Map<string, DomainStores> };

function storeTable(): Map<string, DomainStores> {
  const g: GlobalWithStores = globalThis;
  return (g[GLOBAL_SYMBOL] ??= new Map());
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function show(value: ExternalValue): string {
  return value === UNSET ? '<unset>' : `'${value}'`;
}

export class ScopedStateStore {
  /**
   * Live entries per unit, each list in application order.
   */
  private readonly units = new Map<UnitId, SavedEntry[]>();

  readonly lock: DomainLock;

  constructor(
    readonly domain: string,
    readonly backing: ExternalKeyValueStore
  ) {
    this.lock = new DomainLock(domain);
  }

  /**
   * The process-wide store for `domain` over `backing`.
   *
   * Each backing store gets its own saved entries and lock. Without `backing`,
   * the store most recently requested for the domain is returned.
   *
   * @throws Error if no store exists for the domain and no backing store is given
   */
  static forDomain(domain: string, backing?: ExternalKeyValueStore): ScopedStateStore {
    const table = storeTable();
    const stores = table.get(domain);

    if (!backing) {
      if (!stores) throw new Error(`No backing store registered for state domain '${domain}'.`);
      return stores.current;
    }

    const existing = stores?.byBacking.get(backing);
    const store = existing ?? new ScopedStateStore(domain, backing);
    if (stores) {
      stores.byBacking.set(backing, store);
      stores.current = store;
    } else {
      table.set(domain, { byBacking: new Map([[backing, store]]), current: store });
    }
    return store;
  }

  /**
   * Drop every store.
   *
   * ⚠️ For test environments only. Live entries are discarded without restoring.
   */
  static resetForTests(): void {
    storeTable().clear();
  }

  get hasLiveEntries(): boolean {
    return this.units.size > 0;
  }

  /**
   * Save the current value of `key` for `unitId`, then write `value`.
   *
   * @param value - New value, or UNSET to remove the key
   * @param source - Annotation responsible for the write, for diagnostics
   * @throws {ConflictError} if `key` already has a live entry for this unit
   */
  apply(unitId: UnitId, key: string, value: ExternalValue, source?: string): SavedEntryHandle {
    return this.lock.run(() => {
      const entries = this.units.get(unitId) ?? [];
      const live = entries.find((e) => e.key === key);
      if (live) {
        const sources = [live.source, source].filter((s): s is string => s !== undefined);
        throw new ConflictError(this.domain, key, sources);
      }

      const priorValue = this.backing.get(key);
      writeValue(this.backing, key, value);

      const entry: SavedEntry = Object.freeze({
        key,
        priorValue,
        appliedValue: value,
        depth: entries.length,
        source,
      });
      entries.push(entry);
      this.units.set(unitId, entries);

      log('%s %s: %s → %s (unit %s)', this.domain, key, show(priorValue), show(value), unitId);
      return { unitId, domain: this.domain, key, depth: entry.depth };
    });
  }

  /**
   * Restore every live entry of `unitId`, last applied first, then discard them.
   *
   * All entries are attempted; failures are collected and raised together once
   * the unwind is complete. A key whose value changed since apply() is still
   * restored and reported as drifted.
   *
   * @throws {RestorationError} if at least one entry could not be restored
   */
  restoreAll(unitId: UnitId): RestoreReport {
    const report: RestoreReport = { domain: this.domain, restored: [], drifted: [] };
    const entries = this.units.get(unitId);
    if (!entries) return report;
    this.units.delete(unitId);

    const errors: Error[] = [];
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      try {
        this.lock.run(() => {
          const current = this.backing.get(entry.key);
          if (current !== entry.appliedValue) {
            report.drifted.push(entry.key);
            warn(
              '%s %s changed to %s after it was set to %s; restoring %s anyway',
              this.domain,
              entry.key,
              show(current),
              show(entry.appliedValue),
              show(entry.priorValue)
            );
          }
          writeValue(this.backing, entry.key, entry.priorValue);
        });
        report.restored.push(entry.key);
        log('%s %s restored to %s (unit %s)', this.domain, entry.key, show(entry.priorValue), unitId);
      } catch (err) {
        errors.push(toError(err));
      }
    }

    if (errors.length > 0) throw new RestorationError(errors);
    return report;
  }

  /**
   * Keys with a live entry for `unitId`, in application order.
   */
  liveKeys(unitId: UnitId): string[] {
    return (this.units.get(unitId) ?? []).map((e) => e.key);
  }

  isLive(unitId: UnitId, key: string): boolean {
    return this.units.get(unitId)?.some((e) => e.key === key) ?? false;
  }
}
