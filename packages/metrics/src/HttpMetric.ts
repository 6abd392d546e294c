import { defineMetric } from './Metric';
import { MetricCategory, MetricLevel } from './types';

/**
 * Metrics reported by HTTP client implementations.
 */
export const HttpMetric = {
	HttpClientName: defineMetric(
		'HttpClientName',
		'string',
		MetricLevel.Info,
		MetricCategory.HttpClient,
	),
	/** Maximum number of concurrent requests the client allows */
	MaxConcurrency: defineMetric(
		'MaxConcurrency',
		'number',
		MetricLevel.Info,
		MetricCategory.HttpClient,
	),
	AvailableConcurrency: defineMetric(
		'AvailableConcurrency',
		'number',
		MetricLevel.Info,
		MetricCategory.HttpClient,
	),
	LeasedConcurrency: defineMetric(
		'LeasedConcurrency',
		'number',
		MetricLevel.Info,
		MetricCategory.HttpClient,
	),
	PendingConcurrencyAcquires: defineMetric(
		'PendingConcurrencyAcquires',
		'number',
		MetricLevel.Info,
		MetricCategory.HttpClient,
	),
	HttpStatusCode: defineMetric(
		'HttpStatusCode',
		'number',
		MetricLevel.Trace,
		MetricCategory.HttpClient,
	),
} as const;
