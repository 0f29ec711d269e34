/*
 * ExternalKeyValueStore
 * ---------------------
 * Capability interface over a process-wide key/value resource. The scoped state
 * store never touches process globals directly; it writes through one of these.
 *
 *  - ProcessEnvironmentStore: the real `process.env`
 *  - InMemoryKeyValueStore: an isolated map, for tests and dry runs
 */
import { UNSET, type ExternalValue } from '../types/types.js';

export interface ExternalKeyValueStore {
  /** Current value, or UNSET when the key is absent */
  get(key: string): ExternalValue;
  set(key: string, value: string): void;
  unset(key: string): void;
}

/**
 * Write `value` (or remove the key when UNSET) through a store.
 */
export function writeValue(store: ExternalKeyValueStore, key: string, value: ExternalValue): void {
  if (value === UNSET) store.unset(key);
  else store.set(key, value);
}

/**
 * Binding over the real process environment.
 */
export class ProcessEnvironmentStore implements ExternalKeyValueStore {
  get(key: string): ExternalValue {
    return Object.prototype.hasOwnProperty.call(process.env, key) ? (process.env[key] ?? UNSET) : UNSET;
  }

  set(key: string, value: string): void {
    process.env[key] = value;
  }

  unset(key: string): void {
    delete process.env[key];
  }
}

/**
 * Map-backed store with the same absent/present semantics as `process.env`.
 */
export class InMemoryKeyValueStore implements ExternalKeyValueStore {
  private readonly values: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  get(key: string): ExternalValue {
    return this.values.get(key) ?? UNSET;
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  unset(key: string): void {
    this.values.delete(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  /** Plain-object copy of the current contents */
  snapshot(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}
