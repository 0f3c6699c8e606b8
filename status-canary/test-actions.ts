import type { ScheduledEvent } from 'aws-lambda';
import type { ActionInterface } from './actions';
import { SourceFetchError, StatusUpdateError } from './errors';
import type { ProbeResult, ServiceRecord, StatusLabel } from './types';

export const testTopicArn =
	'arn:aws:sns:us-east-1:123456789123:status-canary-test';

// in-memory stand-in for Notion + SNS + the network. updateStatus() writes
// back into the service list, so consecutive runs see each other's results.
export class TestMockActions implements ActionInterface {
	notifications: Array<{ destination: string; message: string }> = [];
	logMessages: string[] = [];
	errorMessages: string[] = [];
	statusUpdates: Array<{ serviceId: string; status: StatusLabel }> = [];

	sourceUnavailable = false;
	failStatusUpdatesFor = new Set<string>();
	failNotificationsFor = new Set<string>();

	constructor(
		public services: ServiceRecord[],
		public probes: Record<string, ProbeResult>,
	) {}

	listServices() {
		if (this.sourceUnavailable) {
			return Promise.reject(
				new SourceFetchError('Notion database query failed: HTTP 401', 401),
			);
		}

		return Promise.resolve(this.services.map((service) => ({ ...service })));
	}

	updateStatus(serviceId: string, status: StatusLabel) {
		if (this.failStatusUpdatesFor.has(serviceId)) {
			return Promise.reject(
				new StatusUpdateError('Notion page update failed: HTTP 500', 500),
			);
		}

		this.statusUpdates.push({ serviceId, status });
		this.services = this.services.map((service) =>
			service.id === serviceId
				? { ...service, lastRecordedStatus: status }
				: service,
		);

		return Promise.resolve();
	}

	probe(url: string): Promise<ProbeResult> {
		const probe = this.probes[url];
		if (probe === undefined) {
			throw new Error(`unknown url: ${url}`);
		}

		return Promise.resolve(probe);
	}

	sendNotification(destination: string, message: string) {
		if ([...this.failNotificationsFor].some((url) => message.includes(url))) {
			return Promise.reject(new Error('Faking SNS outage'));
		}

		this.notifications.push({ destination, message });

		return Promise.resolve(`msg-${this.notifications.length}`);
	}

	log(msg: string) {
		this.logMessages.push(msg);
	}

	error(msg: string) {
		this.errorMessages.push(msg);
	}

	measureDuration(ended: number, started: number) {
		// keeps "@ 0ms" in log lines so tests can compare them verbatim
		return 0;
	}
}

export function mockScheduledEvent(): ScheduledEvent {
	return {
		version: '0',
		id: 'test-event',
		'detail-type': 'Scheduled Event',
		source: 'aws.events',
		account: '123456789123',
		time: '2026-01-01T00:00:00Z',
		region: 'us-east-1',
		resources: [],
		detail: {},
	};
}

export function service(
	id: string,
	url: string,
	identifier: string,
	lastRecordedStatus: ServiceRecord['lastRecordedStatus'] = '',
): ServiceRecord {
	return { id, url, identifier, lastRecordedStatus };
}
