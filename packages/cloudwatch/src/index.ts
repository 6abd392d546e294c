export {
	CloudWatchConnection,
	type CloudWatchConnectionConfig,
} from './CloudWatchConnection';
export {
	CloudWatchMetricPublisher,
	type CloudWatchMetricPublisherOptions,
} from './CloudWatchMetricPublisher';
export { CloudWatchUploader, type MetricUploader } from './CloudWatchUploader';
export {
	DEFAULT_DIMENSIONS,
	DEFAULT_METRIC_QUEUE_SIZE,
	DEFAULT_NAMESPACE,
	DEFAULT_PUBLISH_FREQUENCY_MS,
	DEFAULT_SHUTDOWN_TIMEOUT_MS,
	environmentSchema,
	MAX_PUBLISH_FREQUENCY_MS,
	type PublisherEnvironment,
	type PublisherSettings,
	publisherSettingsSchema,
} from './config';
export { MetricAggregationError } from './errors';
export {
	type CreateLoggerOptions,
	createLogger,
	type Logger,
	loggerOptions,
	LogLevel,
} from './logger';
export {
	type FlushResult,
	MetricConsumer,
	type MetricConsumerOptions,
} from './MetricConsumer';
export {
	MAX_METRIC_DATA_PER_REQUEST,
	MAX_VALUES_PER_REQUEST,
	MetricCollectionAggregator,
	type MetricCollectionAggregatorOptions,
} from './transform';
