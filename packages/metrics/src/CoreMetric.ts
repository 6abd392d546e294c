import { defineMetric } from './Metric';
import { MetricCategory, MetricLevel } from './types';

/**
 * Metrics reported for every API call, regardless of transport.
 */
export const CoreMetric = {
	/** Identifier of the service being called */
	ServiceId: defineMetric(
		'ServiceId',
		'string',
		MetricLevel.Error,
		MetricCategory.Core,
	),
	/** Name of the operation being invoked */
	OperationName: defineMetric(
		'OperationName',
		'string',
		MetricLevel.Error,
		MetricCategory.Core,
	),
	ApiCallSuccessful: defineMetric(
		'ApiCallSuccessful',
		'boolean',
		MetricLevel.Error,
		MetricCategory.Core,
	),
	/** Total time of the call, including every attempt */
	ApiCallDuration: defineMetric(
		'ApiCallDuration',
		'duration',
		MetricLevel.Info,
		MetricCategory.Core,
	),
	RetryCount: defineMetric(
		'RetryCount',
		'number',
		MetricLevel.Error,
		MetricCategory.Core,
	),
	/** Time of a single attempt, from request sent to response received */
	ServiceCallDuration: defineMetric(
		'ServiceCallDuration',
		'duration',
		MetricLevel.Info,
		MetricCategory.Core,
	),
} as const;
