import type {
	MetricDatum,
	PutMetricDataCommandInput,
} from '@aws-sdk/client-cloudwatch';
import type { MetricCollection } from '@batchmetrics/metrics';
import {
	TimeBucketedMetrics,
	type TimeBucketedMetricsOptions,
} from './TimeBucketedMetrics';

/** Service limit on data per PutMetricData request */
export const MAX_METRIC_DATA_PER_REQUEST = 20;
/** Service limit on values (and summaries) per PutMetricData request */
export const MAX_VALUES_PER_REQUEST = 300;

export interface MetricCollectionAggregatorOptions
	extends TimeBucketedMetricsOptions {
	namespace: string;
	/** Lowers the data-per-request limit (default: 20) */
	maxMetricDataPerRequest?: number;
	/** Lowers the values-per-request limit (default: 300) */
	maxValuesPerRequest?: number;
}

/**
 * Accumulates metric collections and turns them into PutMetricData
 * requests.
 *
 * Not safe for interleaved use: callers must serialize `addCollection`
 * and `getRequests` (see `MetricConsumer`).
 *
 * @example
 * ```typescript
 * const aggregator = new MetricCollectionAggregator({
 *   namespace: 'Checkout/Client',
 *   dimensions: new Set([CoreMetric.ServiceId]),
 *   metricCategories: new Set([MetricCategory.All]),
 *   detailedMetrics: new Set(),
 * });
 *
 * aggregator.addCollection(collector.collect());
 * const requests = aggregator.getRequests(); // drains the aggregator
 * ```
 */
export class MetricCollectionAggregator {
	private readonly namespace: string;
	private readonly maxMetricDataPerRequest: number;
	private readonly maxValuesPerRequest: number;
	private readonly timeBucketedMetrics: TimeBucketedMetrics;

	constructor(options: MetricCollectionAggregatorOptions) {
		this.namespace = options.namespace;
		this.maxMetricDataPerRequest = clampLimit(
			options.maxMetricDataPerRequest,
			MAX_METRIC_DATA_PER_REQUEST,
		);
		this.maxValuesPerRequest = clampLimit(
			options.maxValuesPerRequest,
			MAX_VALUES_PER_REQUEST,
		);
		this.timeBucketedMetrics = new TimeBucketedMetrics(options);
	}

	/**
	 * Adds every reportable value of the collection tree. Values of
	 * disabled categories or levels and non-numeric values are skipped.
	 */
	addCollection(collection: MetricCollection): void {
		this.timeBucketedMetrics.addMetrics(collection);
	}

	/**
	 * Drains everything accumulated so far into requests that respect both
	 * per-request limits. This is a destructive read: the aggregator is
	 * empty afterwards, and a second call without new collections returns
	 * an empty array.
	 */
	getRequests(): PutMetricDataCommandInput[] {
		const batches = new RequestBatcher(
			this.namespace,
			this.maxMetricDataPerRequest,
			this.maxValuesPerRequest,
		);

		for (const { timestamp, aggregators } of this.timeBucketedMetrics.timeBuckets()) {
			for (const aggregator of aggregators) {
				switch (aggregator.kind) {
					case 'summary':
						batches.reserve();
						batches.add(aggregator.toDatum(timestamp), 1);
						break;
					case 'detailed': {
						let offset = 0;
						while (offset < aggregator.size) {
							batches.reserve();
							const count = Math.min(
								batches.remainingValues,
								aggregator.size - offset,
							);
							batches.add(aggregator.toDatum(timestamp, offset, count), count);
							offset += count;
						}
						break;
					}
					default: {
						const unknown: never = aggregator;
						throw new Error(`Unknown aggregator: ${JSON.stringify(unknown)}`);
					}
				}
			}
		}

		const requests = batches.build();
		this.timeBucketedMetrics.reset();

		return requests;
	}

	/** Number of aggregators waiting for the next drain */
	get pendingAggregators(): number {
		return this.timeBucketedMetrics.size;
	}
}

/**
 * Packs data into requests, starting a new request whenever the current
 * one is out of data slots or value slots.
 */
class RequestBatcher {
	private readonly requests: PutMetricDataCommandInput[] = [];
	private data: MetricDatum[] = [];
	private values = 0;

	constructor(
		private readonly namespace: string,
		private readonly maxData: number,
		private readonly maxValues: number,
	) {}

	get remainingValues(): number {
		return this.maxValues - this.values;
	}

	/** Closes the current request when it cannot take another datum */
	reserve(): void {
		if (this.data.length >= this.maxData || this.values >= this.maxValues) {
			this.close();
		}
	}

	add(datum: MetricDatum, valueCount: number): void {
		this.data.push(datum);
		this.values += valueCount;
	}

	build(): PutMetricDataCommandInput[] {
		if (this.data.length > 0) {
			this.close();
		}
		return this.requests;
	}

	private close(): void {
		this.requests.push({ Namespace: this.namespace, MetricData: this.data });
		this.data = [];
		this.values = 0;
	}
}

function clampLimit(value: number | undefined, serviceLimit: number): number {
	if (value === undefined) return serviceLimit;
	return Math.max(1, Math.min(Math.floor(value), serviceLimit));
}
