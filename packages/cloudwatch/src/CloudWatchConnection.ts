import {
	CloudWatchClient,
	type CloudWatchClientConfig,
} from '@aws-sdk/client-cloudwatch';

export interface CloudWatchConnectionConfig {
	region?: string;
	endpoint?: string; // Custom endpoint (e.g., for LocalStack)
	credentials?: {
		accessKeyId: string;
		secretAccessKey: string;
		sessionToken?: string;
	};
}

/**
 * Holds the CloudWatch client used for uploads. A connection built from
 * config owns its client and destroys it on close; a connection wrapping
 * a caller's client leaves it open.
 */
export class CloudWatchConnection {
	private readonly client: CloudWatchClient;
	private readonly ownsClient: boolean;
	private closed = false;

	private constructor(client: CloudWatchClient, ownsClient: boolean) {
		this.client = client;
		this.ownsClient = ownsClient;
	}

	static create(config: CloudWatchConnectionConfig = {}): CloudWatchConnection {
		const clientConfig: CloudWatchClientConfig = {
			region: config.region,
			endpoint: config.endpoint,
			credentials: config.credentials,
		};

		return new CloudWatchConnection(new CloudWatchClient(clientConfig), true);
	}

	static fromClient(client: CloudWatchClient): CloudWatchConnection {
		return new CloudWatchConnection(client, false);
	}

	/**
	 * Create a CloudWatchConnection from a connection string
	 * Format: cloudwatch://?region=us-east-1&endpoint=http://localhost:4566&accessKeyId=test&secretAccessKey=test
	 */
	static fromConnectionString(connectionString: string): CloudWatchConnection {
		const url = new URL(connectionString);
		if (url.protocol !== 'cloudwatch:') {
			throw new Error(`Unsupported connection type: ${url.protocol}`);
		}

		const params = url.searchParams;
		const config: CloudWatchConnectionConfig = {
			region: params.get('region') || undefined,
			endpoint: params.get('endpoint') || undefined,
		};

		const accessKeyId = params.get('accessKeyId');
		const secretAccessKey = params.get('secretAccessKey');
		if (accessKeyId && secretAccessKey) {
			config.credentials = {
				accessKeyId,
				secretAccessKey,
				sessionToken: params.get('sessionToken') || undefined,
			};
		}

		return CloudWatchConnection.create(config);
	}

	get cloudWatchClient(): CloudWatchClient {
		return this.client;
	}

	get ownsCloudWatchClient(): boolean {
		return this.ownsClient;
	}

	isClosed(): boolean {
		return this.closed;
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;

		if (this.ownsClient) {
			this.client.destroy();
		}
	}
}
