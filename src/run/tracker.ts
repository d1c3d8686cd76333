import type { RunTotals } from "../core/types.js";

/**
 * Countdown barrier over outstanding discovery and download work, plus the
 * run's result counters.
 *
 * Each top-level discovery task holds one unit from `seed()` until it
 * finishes, and every discovered repository adds one more through `track()`
 * before it is handed to the downloader. Since a producer only emits while
 * holding its own unit, the count cannot reach zero while a descriptor is
 * still in flight, and `wait()` resolves exactly once.
 */
export class CompletionTracker {
  private outstanding = 0;
  private settled = false;
  private discovered = 0;
  private succeeded = 0;
  private resolveDrained: () => void = () => {};
  private readonly drained: Promise<void>;

  public constructor() {
    this.drained = new Promise<void>((resolve) => {
      this.resolveDrained = resolve;
    });
  }

  public get pending(): number {
    return this.outstanding;
  }

  public get isSettled(): boolean {
    return this.settled;
  }

  public get totals(): RunTotals {
    return { discovered: this.discovered, succeeded: this.succeeded };
  }

  /** Reserves one unit per top-level task. Seeding zero settles immediately. */
  public seed(units: number): void {
    if (!Number.isInteger(units) || units < 0) {
      throw new RangeError(`Cannot seed ${units} units of work.`);
    }

    this.add(units);
    if (this.outstanding === 0) {
      this.settle();
    }
  }

  /** Registers one discovered repository whose download is now pending. */
  public track(): void {
    this.add(1);
    this.discovered += 1;
  }

  public release(): void {
    if (this.outstanding === 0) {
      throw new Error("Released more units of work than were scheduled.");
    }

    this.outstanding -= 1;
    if (this.outstanding === 0) {
      this.settle();
    }
  }

  public recordSuccess(): void {
    this.succeeded += 1;
  }

  public wait(): Promise<void> {
    return this.drained;
  }

  private add(units: number): void {
    if (this.settled) {
      throw new Error("Cannot schedule work after every unit has completed.");
    }

    this.outstanding += units;
  }

  private settle(): void {
    this.settled = true;
    this.resolveDrained();
  }
}
