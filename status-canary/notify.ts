import type { NotificationIntent, ServiceRecord, StatusLabel } from './types';

export function statusMessage(url: string, status: StatusLabel): string {
	return `Status for ${url} is ${status}.`;
}

// only status transitions are worth a notification. a never-recorded status ('')
// differs from every label, so the first classification always notifies.
export function decideNotification(
	service: ServiceRecord,
	newStatus: StatusLabel,
): NotificationIntent | undefined {
	if (newStatus === service.lastRecordedStatus) {
		return undefined;
	}

	return {
		url: service.url,
		status: newStatus,
		message: statusMessage(service.url, newStatus),
	};
}
