import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { PutMetricDataCommandInput } from '@aws-sdk/client-cloudwatch';
import type { MetricCollection } from '@batchmetrics/metrics';
import pLimit, { type LimitFunction } from 'p-limit';
import type { MetricUploader } from './CloudWatchUploader';
import type { Logger } from './logger';
import type { MetricCollectionAggregator } from './transform';

export interface MetricConsumerOptions {
	aggregator: MetricCollectionAggregator;
	uploader: MetricUploader;
	/** Whether `close()` also closes the uploader (default: true) */
	ownsUploader?: boolean;
	logger: Logger;
	/** Collections waiting to be aggregated before new ones are dropped */
	metricQueueSize: number;
	publishFrequencyMs: number;
	/** Upper bound on waiting for in-flight uploads when closing */
	shutdownTimeoutMs: number;
}

export interface FlushResult {
	/** Requests built from the drained aggregator */
	requests: number;
	succeeded: number;
	failed: number;
}

/**
 * Drives the aggregator: collections are added through a single-slot task
 * queue, and a timer drains the aggregator into uploads.
 *
 * Every aggregator access goes through `queue`, so `addCollection` and
 * `getRequests` never interleave.
 */
export class MetricConsumer {
	private readonly aggregator: MetricCollectionAggregator;
	private readonly uploader: MetricUploader;
	private readonly ownsUploader: boolean;
	private readonly logger: Logger;
	private readonly metricQueueSize: number;
	private readonly shutdownTimeoutMs: number;
	private readonly queue: LimitFunction = pLimit(1);
	private readonly inFlight = new Set<Promise<void>>();
	private readonly timer: ReturnType<typeof setInterval>;
	private closed = false;

	constructor(options: MetricConsumerOptions) {
		this.aggregator = options.aggregator;
		this.uploader = options.uploader;
		this.ownsUploader = options.ownsUploader ?? true;
		this.logger = options.logger;
		this.metricQueueSize = options.metricQueueSize;
		this.shutdownTimeoutMs = options.shutdownTimeoutMs;

		this.timer = setInterval(() => {
			this.track(this.flush()).catch((error: unknown) => {
				this.logger.error({ error }, 'Scheduled metric flush failed');
			});
		}, options.publishFrequencyMs);
		this.timer.unref();
	}

	/**
	 * Queues a collection for aggregation. Drops it with a warning when the
	 * queue is full or the consumer is closed.
	 */
	publish(collection: MetricCollection): void {
		if (this.closed) {
			this.logger.warn('Metric collection dropped because the consumer is closed');
			return;
		}

		if (this.queue.pendingCount >= this.metricQueueSize) {
			this.logger.warn(
				{ metricQueueSize: this.metricQueueSize },
				'Metric collection dropped because the metric queue is full',
			);
			return;
		}

		this.queue(() => this.aggregator.addCollection(collection)).catch(
			(error: unknown) => {
				this.logger.error({ error }, 'Failed to aggregate metric collection');
			},
		);
	}

	/**
	 * Drains the aggregator and uploads every request. Waits for room in the
	 * queue instead of dropping the drain. Upload failures are logged and
	 * counted, never thrown.
	 */
	async flush(): Promise<FlushResult> {
		while (this.queue.pendingCount >= this.metricQueueSize) {
			await yieldToEventLoop();
		}

		const requests = await this.queue(() => this.aggregator.getRequests());
		return this.upload(requests);
	}

	/**
	 * Stops the timer, flushes what is left, waits up to
	 * `shutdownTimeoutMs` for in-flight uploads, then closes the uploader
	 * when it is owned.
	 */
	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		clearInterval(this.timer);

		this.track(this.flush()).catch((error: unknown) => {
			this.logger.error({ error }, 'Final metric flush failed');
		});

		const finished = await this.waitForInFlight();
		if (!finished) {
			this.logger.warn(
				{ shutdownTimeoutMs: this.shutdownTimeoutMs, pending: this.inFlight.size },
				'Timed out waiting for metric uploads to finish',
			);
		}

		this.queue.clearQueue();
		if (this.ownsUploader) {
			await this.uploader.close();
		}
	}

	private async upload(
		requests: PutMetricDataCommandInput[],
	): Promise<FlushResult> {
		const results = await Promise.allSettled(
			requests.map((request) => this.uploader.upload(request)),
		);
		const failures = results.filter(
			(result): result is PromiseRejectedResult => result.status === 'rejected',
		);
		const flushResult: FlushResult = {
			requests: requests.length,
			succeeded: requests.length - failures.length,
			failed: failures.length,
		};

		const [firstFailure] = failures;
		if (firstFailure) {
			this.logger.warn(
				{ ...flushResult, error: firstFailure.reason },
				'Failed to publish some metric requests',
			);
		} else if (requests.length > 0) {
			this.logger.debug(flushResult, 'Published metric requests');
		}

		return flushResult;
	}

	private track<T>(promise: Promise<T>): Promise<T> {
		const settled: Promise<void> = promise.then(
			() => {
				this.inFlight.delete(settled);
			},
			() => {
				this.inFlight.delete(settled);
			},
		);
		this.inFlight.add(settled);
		return promise;
	}

	private async waitForInFlight(): Promise<boolean> {
		let timeout: ReturnType<typeof setTimeout> | undefined;
		const timedOut = new Promise<boolean>((resolve) => {
			timeout = setTimeout(() => resolve(false), this.shutdownTimeoutMs);
		});

		try {
			return await Promise.race([
				Promise.all([...this.inFlight]).then(() => true),
				timedOut,
			]);
		} finally {
			clearTimeout(timeout);
		}
	}
}
