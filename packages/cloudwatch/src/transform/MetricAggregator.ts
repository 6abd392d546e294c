import { type MetricDatum, StandardUnit } from '@aws-sdk/client-cloudwatch';
import type { Metric } from '@batchmetrics/metrics';
import { MetricAggregationError } from '../errors';
import type { MetricAggregatorKey } from './MetricAggregatorKey';

/**
 * Running min/max/sum/count of one key. Compact but lossy.
 */
export class SummaryMetricAggregator {
	readonly kind = 'summary' as const;

	private min = Number.POSITIVE_INFINITY;
	private max = Number.NEGATIVE_INFINITY;
	private sum = 0;
	private count = 0;

	constructor(
		readonly key: MetricAggregatorKey,
		readonly unit: StandardUnit,
	) {}

	addValue(value: number): void {
		this.min = Math.min(this.min, value);
		this.max = Math.max(this.max, value);
		this.sum += value;
		this.count += 1;
	}

	get sampleCount(): number {
		return this.count;
	}

	/**
	 * @throws {MetricAggregationError} When no value was ever added
	 */
	toDatum(timestamp: Date): MetricDatum {
		if (this.count === 0) {
			throw new MetricAggregationError(
				`Summary for '${this.key.metric.name}' has no values.`,
			);
		}

		return {
			...baseDatum(this.key, this.unit, timestamp),
			StatisticValues: {
				Minimum: this.min,
				Maximum: this.max,
				Sum: this.sum,
				SampleCount: this.count,
			},
		};
	}
}

/**
 * Exact histogram of one key: every distinct value with the number of
 * times it was seen. Lossless but larger.
 *
 * Values are distinct by `Object.is`, so `-0` and `0` are counted apart.
 */
export class DetailedMetricAggregator {
	readonly kind = 'detailed' as const;

	/** Histogram entries in first-seen order */
	private readonly values: number[] = [];
	private readonly counts: number[] = [];
	private readonly indexByValue = new Map<number, number>();
	private negativeZeroIndex: number | undefined;

	constructor(
		readonly key: MetricAggregatorKey,
		readonly unit: StandardUnit,
	) {}

	addValue(value: number): void {
		const index = this.indexOf(value);
		if (index === undefined) {
			this.remember(value, this.values.length);
			this.values.push(value);
			this.counts.push(1);
		} else {
			this.counts[index] += 1;
		}
	}

	/** Number of distinct values */
	get size(): number {
		return this.values.length;
	}

	/**
	 * Datum holding at most `limit` histogram entries, starting at entry
	 * `offset` in first-seen order.
	 */
	toDatum(timestamp: Date, offset: number, limit: number): MetricDatum {
		return {
			...baseDatum(this.key, this.unit, timestamp),
			Values: this.values.slice(offset, offset + limit),
			Counts: this.counts.slice(offset, offset + limit),
		};
	}

	private indexOf(value: number): number | undefined {
		return Object.is(value, -0)
			? this.negativeZeroIndex
			: this.indexByValue.get(value);
	}

	private remember(value: number, index: number): void {
		if (Object.is(value, -0)) {
			this.negativeZeroIndex = index;
		} else {
			this.indexByValue.set(value, index);
		}
	}
}

export type MetricAggregator = SummaryMetricAggregator | DetailedMetricAggregator;

/**
 * Picks the aggregator variant for a key. Detailed metrics keep their
 * full histogram, every other metric is summarized.
 */
export function createAggregator(
	key: MetricAggregatorKey,
	detailedMetrics: ReadonlySet<Metric>,
): MetricAggregator {
	const unit = unitFor(key.metric);
	return detailedMetrics.has(key.metric)
		? new DetailedMetricAggregator(key, unit)
		: new SummaryMetricAggregator(key, unit);
}

export function unitFor(metric: Metric): StandardUnit {
	return metric.valueType === 'duration'
		? StandardUnit.Milliseconds
		: StandardUnit.None;
}

function baseDatum(
	key: MetricAggregatorKey,
	unit: StandardUnit,
	timestamp: Date,
): MetricDatum {
	return {
		MetricName: key.metric.name,
		Dimensions: [...key.dimensions],
		Timestamp: timestamp,
		Unit: unit,
	};
}
