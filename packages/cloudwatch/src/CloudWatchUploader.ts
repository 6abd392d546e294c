import {
	PutMetricDataCommand,
	type PutMetricDataCommandInput,
} from '@aws-sdk/client-cloudwatch';
import type { CloudWatchConnection } from './CloudWatchConnection';

/**
 * Sends metric batches to the remote store.
 */
export interface MetricUploader {
	upload(request: PutMetricDataCommandInput): Promise<void>;
	close(): Promise<void>;
}

export class CloudWatchUploader implements MetricUploader {
	constructor(private readonly connection: CloudWatchConnection) {}

	async upload(request: PutMetricDataCommandInput): Promise<void> {
		await this.connection.cloudWatchClient.send(
			new PutMetricDataCommand(request),
		);
	}

	/** Closes the connection; injected clients stay open. */
	async close(): Promise<void> {
		await this.connection.close();
	}
}
