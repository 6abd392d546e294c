import {
	CoreMetric,
	DefaultMetricCollector,
	defineMetric,
	Duration,
	HttpMetric,
	type Metric,
	MetricCategory,
	type MetricCollector,
	MetricLevel,
} from '@batchmetrics/metrics';
import { describe, expect, it } from 'vitest';
import {
	MAX_METRIC_DATA_PER_REQUEST,
	MAX_VALUES_PER_REQUEST,
	MetricCollectionAggregator,
	type MetricCollectionAggregatorOptions,
} from '../MetricCollectionAggregator';

const NOW = new Date('2024-05-01T12:34:56.789Z');
const BUCKET = new Date('2024-05-01T12:34:00.000Z');

let metricCount = 0;
function someMetric(): Metric<'number'> {
	metricCount++;
	return defineMetric(
		`AggregatorSpecMetric${metricCount}`,
		'number',
		MetricLevel.Info,
		MetricCategory.HttpClient,
	);
}

function collector(now: Date = NOW): MetricCollector {
	return DefaultMetricCollector.create('ApiCall', { now: () => now });
}

function createAggregator(
	overrides: Partial<MetricCollectionAggregatorOptions> = {},
): MetricCollectionAggregator {
	return new MetricCollectionAggregator({
		namespace: 'namespace',
		dimensions: new Set([CoreMetric.ServiceId, CoreMetric.OperationName]),
		metricCategories: new Set([MetricCategory.HttpClient]),
		detailedMetrics: new Set(),
		...overrides,
	});
}

function aggregatorWithUniqueMetrics(
	count: number,
	overrides: Partial<MetricCollectionAggregatorOptions> = {},
): MetricCollectionAggregator {
	const aggregator = createAggregator(overrides);
	const metrics = collector();
	for (let i = 0; i < count; i++) {
		metrics.reportMetric(someMetric(), 0);
	}
	aggregator.addCollection(metrics.collect());
	return aggregator;
}

function aggregatorWithUniqueValues(count: number): MetricCollectionAggregator {
	const aggregator = createAggregator({
		detailedMetrics: new Set([HttpMetric.MaxConcurrency]),
	});
	for (let i = 0; i < count; i++) {
		const metrics = collector();
		metrics.reportMetric(HttpMetric.MaxConcurrency, i);
		aggregator.addCollection(metrics.collect());
	}
	return aggregator;
}

describe('MetricCollectionAggregator', () => {
	describe('request limits', () => {
		it('should keep data within the per-request limit', () => {
			expect(
				aggregatorWithUniqueMetrics(MAX_METRIC_DATA_PER_REQUEST).getRequests(),
			).toHaveLength(1);

			const requests = aggregatorWithUniqueMetrics(
				MAX_METRIC_DATA_PER_REQUEST + 1,
			).getRequests();
			expect(requests.map((request) => request.MetricData?.length)).toEqual([
				20, 1,
			]);
		});

		it('should split many keys into ceil(N / 20) requests', () => {
			const requests = aggregatorWithUniqueMetrics(45).getRequests();

			expect(requests.map((request) => request.MetricData?.length)).toEqual([
				20, 20, 5,
			]);
		});

		it('should keep values within the per-request limit', () => {
			expect(
				aggregatorWithUniqueValues(MAX_VALUES_PER_REQUEST).getRequests(),
			).toHaveLength(1);

			const requests = aggregatorWithUniqueValues(
				MAX_VALUES_PER_REQUEST + 1,
			).getRequests();
			expect(requests).toHaveLength(2);
			expect(requests[0]?.MetricData?.[0]?.Values).toHaveLength(300);
			expect(requests[1]?.MetricData?.[0]?.Values).toEqual([300]);
			expect(requests[1]?.MetricData?.[0]?.Counts).toEqual([1]);
		});

		it('should split a large histogram across requests', () => {
			const requests = aggregatorWithUniqueValues(650).getRequests();

			expect(
				requests.map((request) => request.MetricData?.[0]?.Values?.length),
			).toEqual([300, 300, 50]);
			expect(requests[2]?.MetricData?.[0]?.Values?.[0]).toBe(600);
		});

		it('should keep detailed data within the per-request limit', () => {
			const detailed = Array.from({ length: 21 }, () => someMetric());
			const aggregator = createAggregator({
				detailedMetrics: new Set(detailed),
			});
			const metrics = collector();
			for (const metric of detailed) {
				metrics.reportMetric(metric, 1);
			}
			aggregator.addCollection(metrics.collect());

			const requests = aggregator.getRequests();

			expect(requests.map((request) => request.MetricData?.length)).toEqual([
				20, 1,
			]);
			expect(requests[1]?.MetricData?.[0]?.Values).toEqual([1]);
		});

		it('should respect both limits across several large histograms', () => {
			const detailed = Array.from({ length: 3 }, () => someMetric());
			const aggregator = createAggregator({
				detailedMetrics: new Set(detailed),
			});
			const metrics = collector();
			for (const metric of detailed) {
				for (let i = 0; i < 450; i++) {
					metrics.reportMetric(metric, i);
				}
			}
			aggregator.addCollection(metrics.collect());

			const requests = aggregator.getRequests();

			expect(
				requests.map((request) =>
					request.MetricData?.map((datum) => datum.Values?.length),
				),
			).toEqual([[300], [150, 150], [300], [300], [150]]);
			for (const request of requests) {
				expect(request.MetricData?.length).toBeLessThanOrEqual(20);
			}
		});

		it('should count each summary as one value', () => {
			const detailed = someMetric();
			const aggregator = createAggregator({
				detailedMetrics: new Set([detailed]),
			});
			const metrics = collector();
			for (let i = 0; i < 295; i++) {
				metrics.reportMetric(detailed, i);
			}
			for (let i = 0; i < 10; i++) {
				metrics.reportMetric(someMetric(), i);
			}
			aggregator.addCollection(metrics.collect());

			const requests = aggregator.getRequests();

			expect(requests.map((request) => request.MetricData?.length)).toEqual([
				6, 5,
			]);
		});

		it('should honour lower configured limits', () => {
			const requests = aggregatorWithUniqueMetrics(12, {
				maxMetricDataPerRequest: 5,
			}).getRequests();

			expect(requests.map((request) => request.MetricData?.length)).toEqual([
				5, 5, 2,
			]);
		});

		it('should never exceed the service limits', () => {
			const requests = aggregatorWithUniqueMetrics(25, {
				maxMetricDataPerRequest: 100,
			}).getRequests();

			expect(requests.map((request) => request.MetricData?.length)).toEqual([
				20, 5,
			]);
		});
	});

	describe('grouping', () => {
		it('should ignore the order dimensions were reported in', () => {
			const aggregator = createAggregator();

			let metrics = collector();
			metrics.reportMetric(CoreMetric.ServiceId, 'ServiceId');
			metrics.reportMetric(CoreMetric.OperationName, 'OperationName');
			metrics.reportMetric(HttpMetric.MaxConcurrency, 1);
			aggregator.addCollection(metrics.collect());

			metrics = collector();
			metrics.reportMetric(CoreMetric.OperationName, 'OperationName');
			metrics.reportMetric(CoreMetric.ServiceId, 'ServiceId');
			metrics.reportMetric(HttpMetric.MaxConcurrency, 2);
			aggregator.addCollection(metrics.collect());

			const requests = aggregator.getRequests();

			expect(requests).toHaveLength(1);
			expect(requests[0]?.MetricData).toHaveLength(1);
			expect(requests[0]?.MetricData?.[0]?.Dimensions).toEqual([
				{ Name: 'ServiceId', Value: 'ServiceId' },
				{ Name: 'OperationName', Value: 'OperationName' },
			]);
			expect(requests[0]?.MetricData?.[0]?.StatisticValues?.SampleCount).toBe(
				2,
			);
		});

		it('should aggregate by dimensions and metric', () => {
			const aggregator = createAggregator();

			let metrics = collector();
			metrics.reportMetric(HttpMetric.MaxConcurrency, 1);
			aggregator.addCollection(metrics.collect());

			metrics = collector();
			metrics.reportMetric(CoreMetric.ServiceId, 'ServiceId');
			metrics.reportMetric(HttpMetric.MaxConcurrency, 2);
			aggregator.addCollection(metrics.collect());

			metrics = collector();
			metrics.reportMetric(CoreMetric.ServiceId, 'ServiceId');
			metrics.reportMetric(CoreMetric.OperationName, 'OperationName');
			metrics.reportMetric(HttpMetric.MaxConcurrency, 3);
			metrics.reportMetric(HttpMetric.AvailableConcurrency, 4);
			aggregator.addCollection(metrics.collect());

			const [request, ...rest] = aggregator.getRequests();

			expect(rest).toEqual([]);
			expect(request?.Namespace).toBe('namespace');
			expect(
				request?.MetricData?.map((datum) => ({
					name: datum.MetricName,
					dimensions: datum.Dimensions?.length,
					sum: datum.StatisticValues?.Sum,
					sampleCount: datum.StatisticValues?.SampleCount,
				})),
			).toEqual([
				{ name: 'MaxConcurrency', dimensions: 0, sum: 1, sampleCount: 1 },
				{ name: 'MaxConcurrency', dimensions: 1, sum: 2, sampleCount: 1 },
				{ name: 'MaxConcurrency', dimensions: 2, sum: 3, sampleCount: 1 },
				{ name: 'AvailableConcurrency', dimensions: 2, sum: 4, sampleCount: 1 },
			]);
		});

		it('should apply top-level dimensions to records of child collections', () => {
			const aggregator = createAggregator();
			const metrics = collector();
			metrics.reportMetric(CoreMetric.ServiceId, 'Parent');
			const attempt = metrics.createChild('ApiCallAttempt');
			attempt.reportMetric(CoreMetric.OperationName, 'ChildOnly');
			attempt.reportMetric(HttpMetric.MaxConcurrency, 7);
			aggregator.addCollection(metrics.collect());

			const datum = aggregator.getRequests()[0]?.MetricData?.[0];

			expect(datum?.MetricName).toBe('MaxConcurrency');
			expect(datum?.Dimensions).toEqual([{ Name: 'ServiceId', Value: 'Parent' }]);
			expect(datum?.StatisticValues?.Sum).toBe(7);
		});

		it('should keep separate minutes in separate data ordered by time', () => {
			const aggregator = createAggregator();

			let metrics = collector(new Date('2024-05-01T12:36:10.000Z'));
			metrics.reportMetric(HttpMetric.MaxConcurrency, 5);
			aggregator.addCollection(metrics.collect());

			metrics = collector(new Date('2024-05-01T12:35:59.999Z'));
			metrics.reportMetric(HttpMetric.MaxConcurrency, 3);
			aggregator.addCollection(metrics.collect());

			metrics = collector(new Date('2024-05-01T12:36:59.000Z'));
			metrics.reportMetric(HttpMetric.MaxConcurrency, 1);
			aggregator.addCollection(metrics.collect());

			const data = aggregator.getRequests()[0]?.MetricData ?? [];

			expect(
				data.map((datum) => ({
					timestamp: datum.Timestamp,
					sum: datum.StatisticValues?.Sum,
				})),
			).toEqual([
				{ timestamp: new Date('2024-05-01T12:35:00.000Z'), sum: 3 },
				{ timestamp: new Date('2024-05-01T12:36:00.000Z'), sum: 6 },
			]);
		});
	});

	describe('summaries', () => {
		it('should summarize values reported to one collector', () => {
			const aggregator = createAggregator();
			const metrics = collector();
			metrics.reportMetric(CoreMetric.ServiceId, 'ServiceId');
			for (const value of [2, 1, 4, 4, 3]) {
				metrics.reportMetric(HttpMetric.MaxConcurrency, value);
			}
			aggregator.addCollection(metrics.collect());

			const requests = aggregator.getRequests();

			expect(requests).toEqual([
				{
					Namespace: 'namespace',
					MetricData: [
						{
							MetricName: 'MaxConcurrency',
							Dimensions: [{ Name: 'ServiceId', Value: 'ServiceId' }],
							Timestamp: BUCKET,
							Unit: 'None',
							StatisticValues: {
								Minimum: 1,
								Maximum: 4,
								Sum: 14,
								SampleCount: 5,
							},
						},
					],
				},
			]);
		});

		it('should summarize values reported across collectors', () => {
			const aggregator = createAggregator();
			for (const value of [2, 1, 4, 4, 3]) {
				const metrics = collector();
				metrics.reportMetric(CoreMetric.ServiceId, 'ServiceId');
				metrics.reportMetric(HttpMetric.MaxConcurrency, value);
				aggregator.addCollection(metrics.collect());
			}

			const datum = aggregator.getRequests()[0]?.MetricData?.[0];

			expect(datum?.StatisticValues).toEqual({
				Minimum: 1,
				Maximum: 4,
				Sum: 14,
				SampleCount: 5,
			});
			expect(datum?.Values).toBeUndefined();
			expect(datum?.Counts).toBeUndefined();
		});

		it('should summarize negative values', () => {
			const aggregator = createAggregator();
			const metrics = collector();
			metrics.reportMetric(HttpMetric.MaxConcurrency, -3);
			metrics.reportMetric(HttpMetric.MaxConcurrency, -7);
			aggregator.addCollection(metrics.collect());

			expect(aggregator.getRequests()[0]?.MetricData?.[0]?.StatisticValues).toEqual(
				{ Minimum: -7, Maximum: -3, Sum: -10, SampleCount: 2 },
			);
		});
	});

	describe('detailed metrics', () => {
		it('should report every distinct value with its count', () => {
			const aggregator = createAggregator({
				detailedMetrics: new Set([HttpMetric.MaxConcurrency]),
			});
			const metrics = collector();
			metrics.reportMetric(CoreMetric.ServiceId, 'ServiceId');
			for (const value of [1, 2, 3, 4, 4]) {
				metrics.reportMetric(HttpMetric.MaxConcurrency, value);
			}
			aggregator.addCollection(metrics.collect());

			const datum = aggregator.getRequests()[0]?.MetricData?.[0];

			expect(datum?.Dimensions).toEqual([
				{ Name: 'ServiceId', Value: 'ServiceId' },
			]);
			expect(datum?.Values).toEqual([1, 2, 3, 4]);
			expect(datum?.Counts).toEqual([1, 1, 1, 2]);
			expect(datum?.StatisticValues).toBeUndefined();
		});

		it('should report durations in milliseconds', () => {
			const duration = defineMetric(
				'AggregatorSpecDuration',
				'duration',
				MetricLevel.Info,
				MetricCategory.HttpClient,
			);
			const aggregator = createAggregator({
				detailedMetrics: new Set([duration]),
			});
			const metrics = collector();
			metrics.reportMetric(duration, Duration.ofSeconds(-10));
			metrics.reportMetric(duration, Duration.ZERO);
			metrics.reportMetric(duration, Duration.ofSeconds(10));
			metrics.reportMetric(duration, Duration.ofNanos(1_250_000));
			aggregator.addCollection(metrics.collect());

			const datum = aggregator.getRequests()[0]?.MetricData?.[0];

			expect(datum?.Unit).toBe('Milliseconds');
			expect(datum?.Values).toEqual([-10_000, 0, 10_000, 1.25]);
		});

		it('should report fractional numbers unchanged', () => {
			const aggregator = createAggregator({
				detailedMetrics: new Set([HttpMetric.MaxConcurrency]),
			});
			const metrics = collector();
			metrics.reportMetric(HttpMetric.MaxConcurrency, -1000.5);
			metrics.reportMetric(HttpMetric.MaxConcurrency, 1000.5);
			aggregator.addCollection(metrics.collect());

			expect(aggregator.getRequests()[0]?.MetricData?.[0]?.Values).toEqual([
				-1000.5, 1000.5,
			]);
		});
	});

	describe('filtering', () => {
		it('should ignore metrics from other categories', () => {
			const aggregator = createAggregator();
			const metrics = collector();
			metrics.reportMetric(CoreMetric.ServiceId, 'ServiceId');
			metrics.reportMetric(CoreMetric.RetryCount, 2);
			aggregator.addCollection(metrics.collect());

			expect(aggregator.getRequests()).toEqual([]);
		});

		it('should report every category when All is configured', () => {
			const aggregator = createAggregator({
				metricCategories: new Set([MetricCategory.All]),
			});
			const metrics = collector();
			metrics.reportMetric(CoreMetric.RetryCount, 2);
			metrics.reportMetric(HttpMetric.MaxConcurrency, 5);
			aggregator.addCollection(metrics.collect());

			expect(
				aggregator.getRequests()[0]?.MetricData?.map((datum) => datum.MetricName),
			).toEqual(['RetryCount', 'MaxConcurrency']);
		});

		it('should ignore metrics below the configured level', () => {
			const metrics = collector();
			metrics.reportMetric(HttpMetric.HttpStatusCode, 404);
			const collection = metrics.collect();

			const atInfo = createAggregator();
			atInfo.addCollection(collection);
			expect(atInfo.getRequests()).toEqual([]);

			const atTrace = createAggregator({ metricLevel: MetricLevel.Trace });
			atTrace.addCollection(collection);
			expect(
				atTrace.getRequests()[0]?.MetricData?.[0]?.StatisticValues?.Sum,
			).toBe(404);
		});

		it('should ignore values that cannot be summarized', () => {
			const aggregator = createAggregator({
				metricCategories: new Set([MetricCategory.All]),
			});
			const metrics = collector();
			metrics.reportMetric(CoreMetric.ApiCallSuccessful, true);
			metrics.reportMetric(HttpMetric.HttpClientName, 'fetch');
			aggregator.addCollection(metrics.collect());

			expect(aggregator.pendingAggregators).toBe(0);
			expect(aggregator.getRequests()).toEqual([]);
		});
	});

	describe('getRequests', () => {
		it('should reset the aggregator', () => {
			const aggregator = createAggregator();
			const metrics = collector();
			metrics.reportMetric(CoreMetric.ServiceId, 'ServiceId');
			metrics.reportMetric(HttpMetric.MaxConcurrency, 1);
			aggregator.addCollection(metrics.collect());

			expect(aggregator.getRequests()).toHaveLength(1);
			expect(aggregator.getRequests()).toEqual([]);
		});

		it('should return no requests when nothing was added', () => {
			expect(createAggregator().getRequests()).toEqual([]);
		});
	});
});
