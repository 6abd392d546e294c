import type { Dimension } from '@aws-sdk/client-cloudwatch';
import {
	Duration,
	type Metric,
	type MetricCollection,
	type MetricRecord,
} from '@batchmetrics/metrics';

/**
 * Flattens a collection tree in pre-order: the records of a node, then
 * the records of each child in turn.
 */
export function extractAllRecords(
	collection: MetricCollection,
	into: MetricRecord[] = [],
): MetricRecord[] {
	into.push(...collection.records);
	for (const child of collection.children) {
		extractAllRecords(child, into);
	}
	return into;
}

/**
 * Builds the dimensions of a collection from the string metrics named in
 * `dimensionMetrics`. Only the top-level records are scanned.
 *
 * Dimensions are sorted by name, descending, so that the order in which
 * they were reported never changes the grouping key.
 */
export function extractDimensions(
	collection: MetricCollection,
	dimensionMetrics: ReadonlySet<Metric>,
): Dimension[] {
	const dimensions: Dimension[] = [];

	for (const { metric, value } of collection.records) {
		if (
			metric.valueType === 'string' &&
			typeof value === 'string' &&
			dimensionMetrics.has(metric)
		) {
			dimensions.push({ Name: metric.name, Value: value });
		}
	}

	return dimensions.sort((a, b) => compareNames(b.Name, a.Name));
}

/**
 * Numeric value of a record in the unit it is uploaded with, or
 * `undefined` when the metric cannot be summarized.
 */
export function numericValue(record: MetricRecord): number | undefined {
	const { metric, value } = record;

	if (metric.valueType === 'duration' && value instanceof Duration) {
		return value.toMillis();
	}
	if (metric.valueType === 'number' && typeof value === 'number') {
		return value;
	}

	return undefined;
}

function compareNames(a: string | undefined, b: string | undefined): number {
	const left = a ?? '';
	const right = b ?? '';
	if (left < right) return -1;
	if (left > right) return 1;
	return 0;
}
