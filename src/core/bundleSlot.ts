import { BundleUnavailableError } from "./errors.js";

/**
 * Single swap point for a rebuilt bundle. Readers call `current()` once per
 * operation and keep that reference, so they see the old value or the new
 * one, never a mix.
 */
export class BundleSlot<T> {
  private value: T | undefined;

  constructor(initial?: T) {
    this.value = initial;
  }

  isLoaded(): boolean {
    return this.value !== undefined;
  }

  current(): T {
    const v = this.value;
    if (v === undefined) throw new BundleUnavailableError();
    return v;
  }

  /** Returns the replaced value, if any. */
  swap(next: T): T | undefined {
    const prev = this.value;
    this.value = next;
    return prev;
  }
}
