/**
 * Completion counter shared by concurrent tasks.
 *
 * Tasks run on a single event loop, so an increment can never interleave with
 * another; the counter still owns its state so callers never touch a bare number.
 */
export class AtomicCounter {
  private value: number;

  constructor(initial = 0) {
    this.value = initial;
  }

  increment(): number {
    this.value += 1;
    return this.value;
  }

  get current(): number {
    return this.value;
  }
}
