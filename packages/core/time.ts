/**
 * Timing helpers for log timestamps and evaluation measurements
 */

/** Factors for translating nanoseconds -> microseconds */
const NANO_PER_SECOND = 1_000_000_000n
const NANO_PER_MILLI = 1_000_000n
const MICRO_PER_SECOND = 1_000_000
const MICRO_PER_MILLI = 1_000

/**
 * Represents a duration of time
 */
export class Duration {
  private _microseconds: number

  private constructor(nanoseconds: bigint) {
    this._microseconds = Number((nanoseconds * 1_000_000n) / NANO_PER_SECOND)
  }

  /**
   * @returns The number of seconds with 6 decimal places for microsecond resolution
   */
  public seconds(): number {
    return this._microseconds / MICRO_PER_SECOND
  }

  /**
   * @returns the number of milliseconds with 3 decimal places for microsecond resolution
   */
  public milliseconds(): number {
    return this._microseconds / MICRO_PER_MILLI
  }

  public microseconds(): number {
    return this._microseconds
  }

  /**
   * @returns The {@link Duration} formatted as milliseconds
   */
  public toString(): string {
    return `${this.milliseconds()}ms`
  }

  /**
   * Create a {@link Duration} from the nanosecond measurement (from something like {@link process.hrtime.bigint()})
   *
   * @param nanoseconds The number of nanoseconds elapsed
   * @returns A new {@link Duration} object
   */
  static ofNano(nanoseconds: bigint): Duration {
    return new Duration(nanoseconds)
  }

  /**
   * Create a {@link Duration} from the millisecond measurement
   *
   * @param milliseconds The whole number of milliseconds elapsed
   * @returns A new {@link Duration} object
   */
  static ofMilli(milliseconds: number): Duration {
    return new Duration(NANO_PER_MILLI * BigInt(milliseconds))
  }

  /**
   * Helper to identify an empty or zero time elapsed duration
   */
  static ZERO: Duration = Duration.ofNano(0n)
}

/**
 * Simple timestamp class to track timings at sub millisecond precision
 */
export class Timestamp {
  private static ORIGIN_NANO: bigint = process.hrtime.bigint()
  private static ORIGIN_UTC: number = Date.now()

  private readonly _nanoseconds: bigint

  constructor(nanoseconds: bigint = process.hrtime.bigint()) {
    this._nanoseconds = nanoseconds
  }

  /**
   * Calculate the difference between the start and end
   *
   * @param begin The starting {@link Timestamp}
   * @param end The ending {@link Timestamp}
   * @returns The {@link Duration} between the stamps or {@link Duration.ZERO}
   * if negative
   */
  static duration(begin: Timestamp, end: Timestamp): Duration {
    return begin.difference(end)
  }

  /**
   * Calculate the time elapsed from this timestamp to the other
   *
   * @param other The later {@link Timestamp}
   * @returns The {@link Duration} between the two timestamps
   */
  difference(other: Timestamp): Duration {
    return other._nanoseconds <= this._nanoseconds
      ? Duration.ZERO
      : Duration.ofNano(other._nanoseconds - this._nanoseconds)
  }

  /**
   * @returns The {@link Timestamp} in ISO format
   */
  toISOString(): string {
    const offset = Number(
      (this._nanoseconds - Timestamp.ORIGIN_NANO) / NANO_PER_MILLI,
    )
    return new Date(Timestamp.ORIGIN_UTC + offset).toISOString()
  }
}

/**
 * A clock that can be used to track time at sub-millisecond precision
 */
export class HiResClock {
  /**
   * @returns The current {@link Timestamp}
   */
  public static timestamp(): Timestamp {
    return new Timestamp(process.hrtime.bigint())
  }
}

/**
 * Custom class that tracks elapsed {@link Duration}
 */
export class Timer {
  private _started: Timestamp | undefined

  /**
   * Start a new timer
   *
   * @returns A new {@link Timer} that has been started
   */
  public static startNew(): Timer {
    const timer = new Timer()
    timer.start()
    return timer
  }

  get running(): boolean {
    return this._started !== undefined
  }

  start(): void {
    if (this._started === undefined) {
      this._started = HiResClock.timestamp()
    }
  }

  /**
   * Stop the timer
   *
   * @returns The {@link Duration} the timer was running or {@link Duration.ZERO} if it was not started
   */
  stop(): Duration {
    const elapsed = this.elapsed()
    this._started = undefined
    return elapsed
  }

  /**
   * @returns The {@link Duration} the timer has been running or {@link Duration.ZERO} if it was not started
   */
  elapsed(): Duration {
    return this._started
      ? this._started.difference(HiResClock.timestamp())
      : Duration.ZERO
  }
}
