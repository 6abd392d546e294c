import { DuplicateMetricError } from './errors';
import {
	type Metric,
	MetricCategory,
	type MetricLevel,
	type MetricValueType,
} from './types';

const registry = new Map<string, Metric>();

/**
 * Defines and registers a metric. Every metric also belongs to
 * {@link MetricCategory.All}.
 *
 * @throws {DuplicateMetricError} When the name is already registered
 *
 * @example
 * ```typescript
 * const CacheHits = defineMetric(
 *   'CacheHits',
 *   'number',
 *   MetricLevel.Info,
 *   MetricCategory.Custom,
 * );
 * ```
 */
export function defineMetric<TType extends MetricValueType>(
	name: string,
	valueType: TType,
	level: MetricLevel,
	...categories: MetricCategory[]
): Metric<TType> {
	if (registry.has(name)) {
		throw new DuplicateMetricError(name);
	}

	const metric: Metric<TType> = Object.freeze({
		name,
		valueType,
		level,
		categories: new Set([...categories, MetricCategory.All]),
	});
	registry.set(name, metric);

	return metric;
}

/**
 * Looks up a registered metric by name.
 */
export function findMetric(name: string): Metric | undefined {
	return registry.get(name);
}
