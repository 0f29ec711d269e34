import { InMemoryKeyValueStore } from '../../src/core/external-store.js';

/** In-memory store whose writes to one key throw while `armed`. */
export class FlakyStore extends InMemoryKeyValueStore {
  armed = false;

  constructor(
    initial: Record<string, string>,
    private readonly failing: string
  ) {
    super(initial);
  }

  override set(key: string, value: string): void {
    if (this.armed && key === this.failing) throw new Error(`cannot write ${key}`);
    super.set(key, value);
  }

  override unset(key: string): void {
    if (this.armed && key === this.failing) throw new Error(`cannot remove ${key}`);
    super.unset(key);
  }
}
