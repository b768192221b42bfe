/**
 * Holds the current settings snapshot read by a backend at send time.
 *
 * `get()` and `set()` are synchronous, so a reader sees either the old
 * snapshot or the new one, never a mix. A reload takes effect on the next
 * event sent.
 */
export class SettingsStore<T> {
  private current: T;

  constructor(initial: T) {
    this.current = initial;
  }

  get(): T {
    return this.current;
  }

  set(next: T): void {
    this.current = next;
  }
}
