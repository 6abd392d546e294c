import type {
	Metric,
	MetricCollection,
	MetricCollector,
	MetricRecord,
	MetricValueType,
	MetricValueTypes,
} from './types';

export interface MetricCollectorOptions {
	/** Clock used to stamp collections (default: `new Date()`) */
	now?: () => Date;
}

class DefaultMetricCollection implements MetricCollection {
	constructor(
		readonly name: string,
		readonly creationTime: Date,
		readonly records: readonly MetricRecord[],
		readonly children: readonly MetricCollection[],
	) {}

	metricValues<TType extends MetricValueType>(
		metric: Metric<TType>,
	): MetricValueTypes[TType][] {
		return this.records
			.filter(
				(record): record is MetricRecord<TType> => record.metric === metric,
			)
			.map((record) => record.value);
	}
}

/**
 * Collects metrics for one unit of work (an API call, an attempt, ...).
 * Children model nested units and are collected with their parent.
 *
 * @example
 * ```typescript
 * const call = DefaultMetricCollector.create('ApiCall');
 * call.reportMetric(CoreMetric.ServiceId, 'DynamoDB');
 *
 * const attempt = call.createChild('ApiCallAttempt');
 * attempt.reportMetric(CoreMetric.ServiceCallDuration, Duration.ofMillis(42));
 *
 * publisher.publish(call.collect());
 * ```
 */
export class DefaultMetricCollector implements MetricCollector {
	private readonly records: MetricRecord[] = [];
	private readonly children: MetricCollector[] = [];
	private readonly now: () => Date;

	private constructor(
		readonly name: string,
		options: MetricCollectorOptions,
	) {
		this.now = options.now ?? (() => new Date());
	}

	static create(
		name: string,
		options: MetricCollectorOptions = {},
	): DefaultMetricCollector {
		return new DefaultMetricCollector(name, options);
	}

	reportMetric<TType extends MetricValueType>(
		metric: Metric<TType>,
		value: MetricValueTypes[TType],
	): void {
		const record: MetricRecord<TType> = { metric, value };
		this.records.push(record);
	}

	createChild(name: string): MetricCollector {
		const child = new DefaultMetricCollector(name, { now: this.now });
		this.children.push(child);
		return child;
	}

	collect(): MetricCollection {
		return new DefaultMetricCollection(
			this.name,
			this.now(),
			[...this.records],
			this.children.map((child) => child.collect()),
		);
	}
}

/**
 * Collector used when metrics are disabled.
 */
export class NoOpMetricCollector implements MetricCollector {
	readonly name = 'NoOp';

	private static readonly INSTANCE = new NoOpMetricCollector();

	static create(): NoOpMetricCollector {
		return NoOpMetricCollector.INSTANCE;
	}

	reportMetric<TType extends MetricValueType>(
		_metric: Metric<TType>,
		_value: MetricValueTypes[TType],
	): void {}

	createChild(_name: string): MetricCollector {
		return this;
	}

	collect(): MetricCollection {
		return new DefaultMetricCollection(this.name, new Date(), [], []);
	}
}
