import type { Duration } from './Duration';

/**
 * Groups metrics so that publishers can opt in to whole families at once.
 */
export enum MetricCategory {
	Core = 'Core',
	HttpClient = 'HttpClient',
	Custom = 'Custom',
	/** Wildcard: every metric belongs to it */
	All = 'All',
}

/**
 * Verbosity of a metric. Ordered from most to least verbose.
 */
export enum MetricLevel {
	/** Highly technical metrics, only useful in specific investigations */
	Trace = 'Trace',
	/** Metrics that explain why errors or slowdowns happen */
	Info = 'Info',
	/** Metrics that report when errors happen */
	Error = 'Error',
}

const LEVEL_ORDER: readonly MetricLevel[] = [
	MetricLevel.Trace,
	MetricLevel.Info,
	MetricLevel.Error,
];

/**
 * Whether a publisher configured at `configured` should report metrics
 * declared at `level`.
 *
 * @example
 * ```typescript
 * includesLevel(MetricLevel.Info, MetricLevel.Error); // true
 * includesLevel(MetricLevel.Info, MetricLevel.Trace); // false
 * ```
 */
export function includesLevel(
	configured: MetricLevel,
	level: MetricLevel,
): boolean {
	return LEVEL_ORDER.indexOf(configured) <= LEVEL_ORDER.indexOf(level);
}

/**
 * Maps each value type tag to the TypeScript type reported for it.
 */
export interface MetricValueTypes {
	string: string;
	number: number;
	boolean: boolean;
	duration: Duration;
}

export type MetricValueType = keyof MetricValueTypes;

/**
 * A metric definition. Identity is by reference; names are unique
 * within the process.
 *
 * @template TType - The value type tag of the metric
 */
export interface Metric<TType extends MetricValueType = MetricValueType> {
	readonly name: string;
	readonly valueType: TType;
	readonly level: MetricLevel;
	readonly categories: ReadonlySet<MetricCategory>;
}

/**
 * A single reported value of a metric.
 */
export interface MetricRecord<TType extends MetricValueType = MetricValueType> {
	readonly metric: Metric<TType>;
	readonly value: MetricValueTypes[TType];
}

/**
 * Read-only tree of metric records produced by a {@link MetricCollector}.
 */
export interface MetricCollection {
	readonly name: string;
	readonly creationTime: Date;
	/** Records reported at this node, in report order */
	readonly records: readonly MetricRecord[];
	readonly children: readonly MetricCollection[];
	/** Values of one metric at this node only */
	metricValues<TType extends MetricValueType>(
		metric: Metric<TType>,
	): MetricValueTypes[TType][];
}

/**
 * Mutable builder for a {@link MetricCollection} tree.
 */
export interface MetricCollector {
	readonly name: string;
	reportMetric<TType extends MetricValueType>(
		metric: Metric<TType>,
		value: MetricValueTypes[TType],
	): void;
	createChild(name: string): MetricCollector;
	collect(): MetricCollection;
}

/**
 * Consumer of finished metric collections.
 */
export interface MetricPublisher {
	/** Hand over a collection. Must not block or throw. */
	publish(collection: MetricCollection): void;
	close(): Promise<void>;
}
