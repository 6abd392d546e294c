import type { Dimension } from '@aws-sdk/client-cloudwatch';
import type { Metric } from '@batchmetrics/metrics';

/**
 * Groups observations by metric and dimension list. Two keys are equal
 * when their metric and every dimension match, so `id` is what maps
 * index by.
 */
export class MetricAggregatorKey {
	readonly id: string;

	constructor(
		readonly metric: Metric,
		readonly dimensions: readonly Dimension[],
	) {
		this.id = JSON.stringify([
			metric.name,
			...dimensions.map((dimension) => [dimension.Name, dimension.Value]),
		]);
	}

	equals(other: MetricAggregatorKey): boolean {
		return this.metric === other.metric && this.id === other.id;
	}
}
