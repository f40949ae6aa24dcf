/**
 * Sink for values produced under measurement.
 *
 * Storing each result in a field of a long-lived object keeps the value
 * observable, so the optimizing compiler cannot drop the call that produced it.
 * Pass one Blackhole per run; there is no module-level state.
 */
export class Blackhole {
  private last: unknown = undefined;
  private count = 0;

  /** @return value unchanged, after recording it as observed */
  consume<T>(value: T): T {
    this.last = value;
    this.count++;
    return value;
  }

  /** number of values consumed so far */
  get observed(): number {
    return this.count;
  }

  /** most recently consumed value */
  get lastValue(): unknown {
    return this.last;
  }
}
