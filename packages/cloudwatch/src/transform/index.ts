export {
	createAggregator,
	DetailedMetricAggregator,
	type MetricAggregator,
	SummaryMetricAggregator,
	unitFor,
} from './MetricAggregator';
export { MetricAggregatorKey } from './MetricAggregatorKey';
export {
	MAX_METRIC_DATA_PER_REQUEST,
	MAX_VALUES_PER_REQUEST,
	MetricCollectionAggregator,
	type MetricCollectionAggregatorOptions,
} from './MetricCollectionAggregator';
export { extractAllRecords, extractDimensions, numericValue } from './records';
export {
	type TimeBucket,
	TimeBucketedMetrics,
	type TimeBucketedMetricsOptions,
} from './TimeBucketedMetrics';
