import type { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import type {
	Metric,
	MetricCategory,
	MetricCollection,
	MetricLevel,
	MetricPublisher,
} from '@batchmetrics/metrics';
import {
	CloudWatchConnection,
	type CloudWatchConnectionConfig,
} from './CloudWatchConnection';
import { CloudWatchUploader, type MetricUploader } from './CloudWatchUploader';
import {
	DEFAULT_DIMENSIONS,
	environmentSchema,
	publisherSettingsSchema,
} from './config';
import { createLogger, type Logger, type LogLevel } from './logger';
import { type FlushResult, MetricConsumer } from './MetricConsumer';
import { MetricCollectionAggregator } from './transform';

export interface CloudWatchMetricPublisherOptions {
	/** Client to upload with. Left open when the publisher closes. */
	client?: CloudWatchClient;
	/** Used to build an owned client when `client` is not given */
	connection?: CloudWatchConnectionConfig | string;
	/** Replaces the CloudWatch upload path entirely. Left open on close. */
	uploader?: MetricUploader;
	namespace?: string;
	publishFrequencyMs?: number;
	/** Pending collections before new ones are dropped (default: 10000) */
	metricQueueSize?: number;
	shutdownTimeoutMs?: number;
	/** String metrics used as dimensions (default: ServiceId, OperationName) */
	dimensions?: readonly Metric<'string'>[];
	metricCategories?: MetricCategory[];
	metricLevel?: MetricLevel;
	/** Metrics uploaded as exact value/count histograms */
	detailedMetrics?: readonly Metric[];
	maxMetricDataPerRequest?: number;
	maxValuesPerRequest?: number;
	logger?: Logger;
	logLevel?: LogLevel;
}

/**
 * Publishes metric collections to Amazon CloudWatch. Collections are
 * aggregated per minute and dimension set, then uploaded as
 * PutMetricData requests on a fixed schedule.
 *
 * @example
 * ```typescript
 * const publisher = CloudWatchMetricPublisher.create({
 *   namespace: 'Checkout/Client',
 *   publishFrequencyMs: 30_000,
 *   detailedMetrics: [CoreMetric.ApiCallDuration],
 * });
 *
 * publisher.publish(collector.collect());
 *
 * // On shutdown
 * await publisher.close();
 * ```
 */
export class CloudWatchMetricPublisher implements MetricPublisher {
	private constructor(private readonly consumer: MetricConsumer) {}

	/**
	 * @throws {ZodError} When a setting is out of range
	 */
	static create(
		options: CloudWatchMetricPublisherOptions = {},
	): CloudWatchMetricPublisher {
		const settings = publisherSettingsSchema.parse({
			namespace: options.namespace,
			publishFrequencyMs: options.publishFrequencyMs,
			metricQueueSize: options.metricQueueSize,
			shutdownTimeoutMs: options.shutdownTimeoutMs,
			metricCategories: options.metricCategories,
			metricLevel: options.metricLevel,
			maxMetricDataPerRequest: options.maxMetricDataPerRequest,
			maxValuesPerRequest: options.maxValuesPerRequest,
			logLevel: options.logLevel,
		});

		const logger =
			options.logger ??
			createLogger({ name: 'cloudwatch-metrics', level: settings.logLevel });

		const aggregator = new MetricCollectionAggregator({
			namespace: settings.namespace,
			dimensions: new Set(options.dimensions ?? DEFAULT_DIMENSIONS),
			metricCategories: new Set(settings.metricCategories),
			metricLevel: settings.metricLevel,
			detailedMetrics: new Set(options.detailedMetrics ?? []),
			maxMetricDataPerRequest: settings.maxMetricDataPerRequest,
			maxValuesPerRequest: settings.maxValuesPerRequest,
		});

		const consumer = new MetricConsumer({
			aggregator,
			uploader:
				options.uploader ?? new CloudWatchUploader(resolveConnection(options)),
			ownsUploader: options.uploader === undefined,
			logger: logger.child({ component: 'MetricConsumer' }),
			metricQueueSize: settings.metricQueueSize,
			publishFrequencyMs: settings.publishFrequencyMs,
			shutdownTimeoutMs: settings.shutdownTimeoutMs,
		});

		logger.debug(
			{
				namespace: settings.namespace,
				publishFrequencyMs: settings.publishFrequencyMs,
				metricQueueSize: settings.metricQueueSize,
			},
			'CloudWatch metric publisher started',
		);

		return new CloudWatchMetricPublisher(consumer);
	}

	/**
	 * Builds a publisher from `CLOUDWATCH_METRICS_*` environment variables.
	 * Explicit options win over the environment.
	 *
	 * @example
	 * ```typescript
	 * // CLOUDWATCH_METRICS_NAMESPACE=Checkout/Client
	 * // CLOUDWATCH_METRICS_DETAILED=ApiCallDuration,ServiceCallDuration
	 * const publisher = CloudWatchMetricPublisher.fromEnvironment(process.env);
	 * ```
	 */
	static fromEnvironment(
		env: Record<string, string | undefined> = process.env,
		options: CloudWatchMetricPublisherOptions = {},
	): CloudWatchMetricPublisher {
		const parsed = environmentSchema.parse(env);

		return CloudWatchMetricPublisher.create({
			namespace: parsed.CLOUDWATCH_METRICS_NAMESPACE,
			publishFrequencyMs: parsed.CLOUDWATCH_METRICS_PUBLISH_FREQUENCY_MS,
			metricQueueSize: parsed.CLOUDWATCH_METRICS_QUEUE_SIZE,
			dimensions: parsed.CLOUDWATCH_METRICS_DIMENSIONS,
			metricCategories: parsed.CLOUDWATCH_METRICS_CATEGORIES,
			metricLevel: parsed.CLOUDWATCH_METRICS_LEVEL,
			detailedMetrics: parsed.CLOUDWATCH_METRICS_DETAILED,
			connection: parsed.CLOUDWATCH_METRICS_CONNECTION,
			logLevel: parsed.LOG_LEVEL,
			...definedOptions(options),
		});
	}

	publish(collection: MetricCollection): void {
		this.consumer.publish(collection);
	}

	/**
	 * Uploads everything aggregated so far without waiting for the timer.
	 */
	flush(): Promise<FlushResult> {
		return this.consumer.flush();
	}

	async close(): Promise<void> {
		await this.consumer.close();
	}
}

function resolveConnection(
	options: CloudWatchMetricPublisherOptions,
): CloudWatchConnection {
	if (options.client) {
		return CloudWatchConnection.fromClient(options.client);
	}
	if (typeof options.connection === 'string') {
		return CloudWatchConnection.fromConnectionString(options.connection);
	}
	return CloudWatchConnection.create(options.connection);
}

function definedOptions(
	options: CloudWatchMetricPublisherOptions,
): CloudWatchMetricPublisherOptions {
	const defined: CloudWatchMetricPublisherOptions = {};
	for (const [key, value] of Object.entries(options)) {
		if (value !== undefined) {
			Object.assign(defined, { [key]: value });
		}
	}
	return defined;
}
