import * as AWS from 'aws-sdk';
import type { Config } from './config';
import { NotionServiceStore } from './notion';
import { probeUrl } from './probe';
import type { ProbeResult, ServiceRecord, StatusLabel } from './types';

export interface ActionInterface {
	listServices: () => Promise<ServiceRecord[]>;
	updateStatus: (serviceId: string, status: StatusLabel) => Promise<void>;
	probe: (url: string) => Promise<ProbeResult>;
	// resolves to the delivery id of the sent message
	sendNotification: (destination: string, message: string) => Promise<string>;
	log: (msg: string) => void;
	// fatal errors, kept apart from the per-run log
	error: (msg: string) => void;
	measureDuration: (ended: number, started: number) => number;
}

// the part of AWS.SNS we use
export interface SnsPublisher {
	publish(
		params: AWS.SNS.PublishInput,
		callback: (err: Error | null, data: AWS.SNS.PublishResponse) => void,
	): unknown;
}

export class ProdActions implements ActionInterface {
	private readonly store: NotionServiceStore;

	constructor(
		private readonly config: Config,
		private readonly sns: SnsPublisher = new AWS.SNS({
			apiVersion: '2010-03-31',
			region: config.awsRegion,
		}),
	) {
		this.store = new NotionServiceStore(config.notion, (msg) => {
			this.log(msg);
		});
	}

	listServices() {
		return this.store.listServices();
	}

	updateStatus(serviceId: string, status: StatusLabel) {
		return this.store.updateStatus(serviceId, status);
	}

	probe(url: string) {
		return probeUrl(url, this.config.probeTimeoutMs);
	}

	sendNotification(destination: string, message: string) {
		return new Promise<string>((resolve, reject) => {
			this.sns.publish(
				{
					TopicArn: destination,
					Message: message,
				},
				(err, data) => {
					if (err) {
						reject(err);
					} else {
						resolve(data.MessageId ?? '');
					}
				},
			);
		});
	}

	log(msg: string) {
		// tslint:disable-next-line:no-console
		console.log(msg);
	}

	error(msg: string) {
		// tslint:disable-next-line:no-console
		console.error(msg);
	}

	measureDuration(ended: number, started: number) {
		return ended - started;
	}
}
