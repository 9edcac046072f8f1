/**
 * Container lifecycle state machine.
 *
 * ```
 *             serialize | hash | freeze | upload
 *   ┌─────────┐ ───────────────────────────────▶ ┌───────────┐
 *   │ mutable │                                   │ immutable │ ──┐ serialize | hash
 *   └─────────┘ ◀─────────────────────────────── └───────────┘ ◀─┘ freeze | upload
 *                           release
 * ```
 *
 * Containers built from items start mutable; containers loaded from an
 * archive or downloaded from a store start immutable. Entering the
 * immutable state runs the owner's lock hook exactly once per entry, which
 * is where item values get frozen.
 */

import { ImmutableContainerError } from "./errors.js";

export type LifecycleState = "mutable" | "immutable";

export type LifecycleEvent = "serialize" | "hash" | "freeze" | "upload" | "release";

const TRANSITIONS: Readonly<Record<LifecycleEvent, LifecycleState>> = {
  serialize: "immutable",
  hash: "immutable",
  freeze: "immutable",
  upload: "immutable",
  release: "mutable",
};

export interface LifecycleHooks {
  /** Called on every mutable → immutable transition */
  onLock?: () => void;
}

export class Lifecycle {
  private _state: LifecycleState;
  private readonly hooks: LifecycleHooks;

  constructor(initial: LifecycleState, hooks: LifecycleHooks = {}) {
    this._state = initial;
    this.hooks = hooks;
  }

  get state(): LifecycleState {
    return this._state;
  }

  get isMutable(): boolean {
    return this._state === "mutable";
  }

  /**
   * Apply an event.
   *
   * @returns Whether the state changed
   */
  fire(event: LifecycleEvent): boolean {
    const next = TRANSITIONS[event];
    if (next === this._state) {
      return false;
    }
    this._state = next;
    if (next === "immutable") {
      this.hooks.onLock?.();
    }
    return true;
  }

  /**
   * @throws ImmutableContainerError unless the state is mutable
   */
  assertMutable(action: string): void {
    if (this._state !== "mutable") {
      throw new ImmutableContainerError(action);
    }
  }
}
