/**
 * Raised when the aggregation state breaks one of its own invariants,
 * such as flushing a summary that never received a value. Never caused by
 * caller input.
 */
export class MetricAggregationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'MetricAggregationError';
	}
}
