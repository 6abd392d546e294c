export { CoreMetric } from './CoreMetric';
export {
	DefaultMetricCollector,
	type MetricCollectorOptions,
	NoOpMetricCollector,
} from './DefaultMetricCollector';
export { Duration } from './Duration';
export { DuplicateMetricError } from './errors';
export { HttpMetric } from './HttpMetric';
export { defineMetric, findMetric } from './Metric';
export {
	includesLevel,
	type Metric,
	MetricCategory,
	type MetricCollection,
	type MetricCollector,
	MetricLevel,
	type MetricPublisher,
	type MetricRecord,
	type MetricValueType,
	type MetricValueTypes,
} from './types';
