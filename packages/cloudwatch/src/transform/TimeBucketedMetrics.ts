import {
	includesLevel,
	type Metric,
	MetricCategory,
	type MetricCollection,
	MetricLevel,
	type MetricRecord,
} from '@batchmetrics/metrics';
import { createAggregator, type MetricAggregator } from './MetricAggregator';
import { MetricAggregatorKey } from './MetricAggregatorKey';
import { extractAllRecords, extractDimensions, numericValue } from './records';

const BUCKET_SIZE_MS = 60_000;

export interface TimeBucketedMetricsOptions {
	/** String metrics whose values become dimensions */
	dimensions: ReadonlySet<Metric>;
	/** Categories to report. {@link MetricCategory.All} reports everything. */
	metricCategories: ReadonlySet<MetricCategory>;
	/** Least severe level to report (default: Info) */
	metricLevel?: MetricLevel;
	/** Metrics kept as exact histograms instead of summaries */
	detailedMetrics: ReadonlySet<Metric>;
}

/**
 * One-minute time bucket with its aggregators.
 */
export interface TimeBucket {
	timestamp: Date;
	aggregators: MetricAggregator[];
}

/**
 * Aggregators grouped by minute, then by {@link MetricAggregatorKey}.
 * Grows until {@link TimeBucketedMetrics.reset} is called.
 */
export class TimeBucketedMetrics {
	private readonly buckets = new Map<number, Map<string, MetricAggregator>>();
	private readonly dimensions: ReadonlySet<Metric>;
	private readonly metricCategories: ReadonlySet<MetricCategory>;
	private readonly reportAllCategories: boolean;
	private readonly metricLevel: MetricLevel;
	private readonly detailedMetrics: ReadonlySet<Metric>;

	constructor(options: TimeBucketedMetricsOptions) {
		this.dimensions = options.dimensions;
		this.metricCategories = options.metricCategories;
		this.reportAllCategories = options.metricCategories.has(
			MetricCategory.All,
		);
		this.metricLevel = options.metricLevel ?? MetricLevel.Info;
		this.detailedMetrics = options.detailedMetrics;
	}

	addMetrics(collection: MetricCollection): void {
		const bucketTimestamp =
			Math.floor(collection.creationTime.getTime() / BUCKET_SIZE_MS) *
			BUCKET_SIZE_MS;
		const dimensions = extractDimensions(collection, this.dimensions);

		for (const record of extractAllRecords(collection)) {
			if (!this.isReported(record)) continue;

			const value = numericValue(record);
			if (value === undefined) continue;

			const bucket = this.bucketFor(bucketTimestamp);
			const key = new MetricAggregatorKey(record.metric, dimensions);
			let aggregator = bucket.get(key.id);
			if (!aggregator) {
				aggregator = createAggregator(key, this.detailedMetrics);
				bucket.set(key.id, aggregator);
			}
			aggregator.addValue(value);
		}
	}

	/**
	 * Buckets in ascending time order. Aggregators keep the order in which
	 * their keys were first seen.
	 */
	timeBuckets(): TimeBucket[] {
		return [...this.buckets.entries()]
			.sort(([a], [b]) => a - b)
			.map(([timestamp, aggregators]) => ({
				timestamp: new Date(timestamp),
				aggregators: [...aggregators.values()],
			}));
	}

	/** Number of aggregators across all buckets */
	get size(): number {
		let size = 0;
		for (const bucket of this.buckets.values()) {
			size += bucket.size;
		}
		return size;
	}

	reset(): void {
		this.buckets.clear();
	}

	private bucketFor(timestamp: number): Map<string, MetricAggregator> {
		let bucket = this.buckets.get(timestamp);
		if (!bucket) {
			bucket = new Map();
			this.buckets.set(timestamp, bucket);
		}
		return bucket;
	}

	private isReported(record: MetricRecord): boolean {
		const { metric } = record;
		if (!includesLevel(this.metricLevel, metric.level)) return false;
		if (this.reportAllCategories) return true;

		for (const category of metric.categories) {
			if (this.metricCategories.has(category)) return true;
		}
		return false;
	}
}
