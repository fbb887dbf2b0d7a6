/**
 * Handle-addressed arena for values shared between a request and its workers
 */

import { randomBytes } from "node:crypto";

/** Opaque reference into an arena */
export type Handle = string;

interface Entry<T> {
  value: T;
  owned: boolean;
}

export interface ArenaOptions<T> {
  /** Copy applied to values leaving the arena; defaults to structuredClone */
  clone?: (value: T) => T;
}

/**
 * Owning store of values keyed by handle. All mutation goes through update(),
 * so a caller never holds a value it could write back stale.
 */
export class Arena<T> {
  private readonly entries = new Map<Handle, Entry<T>>();
  private readonly clone: (value: T) => T;

  constructor(
    private readonly kind: string,
    options: ArenaOptions<T> = {},
  ) {
    this.clone = options.clone ?? ((value) => structuredClone(value));
  }

  create(value: T, owned: boolean): Handle {
    const handle = `${this.kind}_${randomBytes(6).toString("hex")}`;
    this.entries.set(handle, { value: this.clone(value), owned });
    return handle;
  }

  has(handle: Handle): boolean {
    return this.entries.has(handle);
  }

  get(handle: Handle): T | undefined {
    const entry = this.entries.get(handle);
    return entry ? this.clone(entry.value) : undefined;
  }

  isOwned(handle: Handle): boolean {
    return this.entries.get(handle)?.owned ?? false;
  }

  /**
   * Apply a synchronous read-modify-write. Runs to completion before any other
   * update can observe the value.
   */
  update(handle: Handle, fn: (current: T) => T): T {
    const entry = this.require(handle);
    entry.value = fn(this.clone(entry.value));
    return this.clone(entry.value);
  }

  /**
   * Remove the entry if this arena's creator owns it
   */
  release(handle: Handle): boolean {
    const entry = this.entries.get(handle);
    if (!entry || !entry.owned) {
      return false;
    }
    this.entries.delete(handle);
    return true;
  }

  private require(handle: Handle): Entry<T> {
    const entry = this.entries.get(handle);
    if (!entry) {
      throw new Error(`Unknown ${this.kind} handle: ${handle}`);
    }
    return entry;
  }
}
