/**
 * Thrown when a metric name is defined more than once.
 */
export class DuplicateMetricError extends Error {
	public readonly metricName: string;

	constructor(metricName: string) {
		super(`A metric named '${metricName}' has already been defined.`);
		this.name = 'DuplicateMetricError';
		this.metricName = metricName;
	}
}
