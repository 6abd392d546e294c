import {
	CoreMetric,
	findMetric,
	type Metric,
	MetricCategory,
	MetricLevel,
} from '@batchmetrics/metrics';
import { z } from 'zod/v4';
import { LogLevel } from './logger';

export const DEFAULT_NAMESPACE = 'BatchMetrics/Client';
export const DEFAULT_METRIC_QUEUE_SIZE = 10_000;
export const DEFAULT_PUBLISH_FREQUENCY_MS = 60_000;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5_000;
/** Longest delay a Node.js timer accepts */
export const MAX_PUBLISH_FREQUENCY_MS = 2_147_483_647;

export const DEFAULT_DIMENSIONS: readonly Metric<'string'>[] = [
	CoreMetric.ServiceId,
	CoreMetric.OperationName,
];

/**
 * Scalar publisher settings. Missing values take their defaults.
 */
export const publisherSettingsSchema = z.object({
	namespace: z.string().min(1).default(DEFAULT_NAMESPACE),
	publishFrequencyMs: z
		.number()
		.int()
		.positive()
		.max(MAX_PUBLISH_FREQUENCY_MS)
		.default(DEFAULT_PUBLISH_FREQUENCY_MS),
	metricQueueSize: z.number().int().positive().default(DEFAULT_METRIC_QUEUE_SIZE),
	shutdownTimeoutMs: z
		.number()
		.int()
		.nonnegative()
		.default(DEFAULT_SHUTDOWN_TIMEOUT_MS),
	metricCategories: z
		.array(z.enum(MetricCategory))
		.min(1)
		.default([MetricCategory.All]),
	metricLevel: z.enum(MetricLevel).default(MetricLevel.Info),
	maxMetricDataPerRequest: z.number().int().min(1).max(20).optional(),
	maxValuesPerRequest: z.number().int().min(1).max(300).optional(),
	logLevel: z.enum(LogLevel).default(LogLevel.Info),
});

export type PublisherSettings = z.infer<typeof publisherSettingsSchema>;

const commaSeparated = z
	.string()
	.transform((value) =>
		value
			.split(',')
			.map((item) => item.trim())
			.filter((item) => item.length > 0),
	);

const metricNames = commaSeparated.transform((names, ctx) => {
	const metrics: Metric[] = [];
	for (const name of names) {
		const metric = findMetric(name);
		if (metric) {
			metrics.push(metric);
		} else {
			ctx.addIssue({ code: 'custom', message: `Unknown metric '${name}'` });
		}
	}
	return metrics;
});

const dimensionNames = metricNames.transform((metrics, ctx) => {
	const dimensions: Metric<'string'>[] = [];
	for (const metric of metrics) {
		if (isStringMetric(metric)) {
			dimensions.push(metric);
		} else {
			ctx.addIssue({
				code: 'custom',
				message: `Metric '${metric.name}' is not a string metric`,
			});
		}
	}
	return dimensions;
});

/**
 * Environment variables read by `CloudWatchMetricPublisher.fromEnvironment`.
 */
export const environmentSchema = z.object({
	CLOUDWATCH_METRICS_NAMESPACE: z.string().min(1).optional(),
	CLOUDWATCH_METRICS_PUBLISH_FREQUENCY_MS: z.coerce
		.number()
		.int()
		.positive()
		.max(MAX_PUBLISH_FREQUENCY_MS)
		.optional(),
	CLOUDWATCH_METRICS_QUEUE_SIZE: z.coerce.number().int().positive().optional(),
	CLOUDWATCH_METRICS_DIMENSIONS: dimensionNames.optional(),
	CLOUDWATCH_METRICS_CATEGORIES: commaSeparated
		.pipe(z.array(z.enum(MetricCategory)))
		.optional(),
	CLOUDWATCH_METRICS_LEVEL: z.enum(MetricLevel).optional(),
	CLOUDWATCH_METRICS_DETAILED: metricNames.optional(),
	CLOUDWATCH_METRICS_CONNECTION: z.string().startsWith('cloudwatch://').optional(),
	LOG_LEVEL: z.enum(LogLevel).optional(),
});

export type PublisherEnvironment = z.infer<typeof environmentSchema>;

function isStringMetric(metric: Metric): metric is Metric<'string'> {
	return metric.valueType === 'string';
}
