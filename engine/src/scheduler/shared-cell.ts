/**
 * Shared Cell
 *
 * Single-slot container for a value shared between concurrent callers.
 * Writes go through a serializer; reads see the last committed value.
 */

import { StateNotFoundError } from "../errors.js";
import { createSerializer, type Serializer } from "./serial.js";

/** Draft of the cell's slot handed to `access` transforms. */
export interface CellSlot<T> {
  value: T | undefined;
}

export class SharedCell<T> {
  private value: T | undefined;
  private readonly serial: Serializer = createSerializer();

  constructor(
    private readonly name: string,
    initial?: T
  ) {
    this.value = initial;
  }

  /**
   * Atomic read-modify-write. The transform edits a draft slot; the draft is
   * committed only if the transform returns without throwing.
   */
  access<R>(transform: (slot: CellSlot<T>) => R | Promise<R>): Promise<R> {
    return this.serial.run(async () => {
      const draft: CellSlot<T> = { value: this.value };
      const result = await transform(draft);
      this.value = draft.value;
      return result;
    });
  }

  override(value: T): Promise<void> {
    return this.serial.run(() => {
      this.value = value;
    });
  }

  clear(): Promise<void> {
    return this.serial.run(() => {
      this.value = undefined;
    });
  }

  /**
   * Current value, or `defaultValue` when empty.
   * Throws StateNotFoundError when empty and no default is given.
   */
  read(defaultValue?: T): T {
    if (this.value !== undefined) return this.value;
    if (defaultValue !== undefined) return defaultValue;
    throw new StateNotFoundError(this.name);
  }

  isEmpty(): boolean {
    return this.value === undefined;
  }
}
