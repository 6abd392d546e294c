const NANOS_PER_MILLI = 1_000_000;
const NANOS_PER_SECOND = 1_000_000_000;

/**
 * Immutable span of time with nanosecond precision.
 *
 * @example
 * ```typescript
 * const start = process.hrtime.bigint();
 * await callService();
 * collector.reportMetric(
 *   CoreMetric.ServiceCallDuration,
 *   Duration.between(start, process.hrtime.bigint()),
 * );
 * ```
 */
export class Duration {
	static readonly ZERO = new Duration(0);

	private constructor(private readonly nanos: number) {}

	static ofNanos(nanos: number | bigint): Duration {
		return new Duration(Number(nanos));
	}

	static ofMillis(millis: number): Duration {
		return new Duration(millis * NANOS_PER_MILLI);
	}

	static ofSeconds(seconds: number): Duration {
		return new Duration(seconds * NANOS_PER_SECOND);
	}

	/**
	 * Duration between two `process.hrtime.bigint()` readings.
	 */
	static between(start: bigint, end: bigint): Duration {
		return new Duration(Number(end - start));
	}

	toNanos(): number {
		return this.nanos;
	}

	/** Fractional milliseconds */
	toMillis(): number {
		return this.nanos / NANOS_PER_MILLI;
	}

	toString(): string {
		return `${this.toMillis()}ms`;
	}
}
