// SwitchLock: single-flight guard for reconciliation. Never waits: a caller
// that finds the lock held gets `null` and must report "busy".

export class SwitchLock {
  #held = false;

  /** Returns a release function, or `null` when another run holds the lock. */
  tryAcquire(): (() => void) | null {
    if (this.#held) return null;
    this.#held = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.#held = false;
    };
  }

  get held(): boolean {
    return this.#held;
  }
}
