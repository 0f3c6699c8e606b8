export const statusLabels = [
	'Operational',
	'Doubtful',
	'Warning',
	'Maintenance',
	'Down',
] as const;

export type StatusLabel = typeof statusLabels[number];

// '' = never recorded
export type RecordedStatus = StatusLabel | '';

export function isStatusLabel(input: string): input is StatusLabel {
	return statusLabels.some((label) => label === input);
}

export interface ServiceRecord {
	id: string;
	url: string;
	// expected to appear (case-insensitively) in a healthy response body
	identifier: string;
	lastRecordedStatus: RecordedStatus;
}

export type ProbeResult =
	| { kind: 'response'; statusCode: number; body: string }
	| { kind: 'no-response'; reason: string };

export interface NotificationIntent {
	url: string;
	status: StatusLabel;
	message: string;
}

export interface CanaryConfig {
	notificationDestination: string;
}

export interface ServiceCheckResult {
	service: ServiceRecord;
	probe: ProbeResult;
	status: StatusLabel;
	durationMs: number;
	statusUpdateError?: string;
	deliveryId?: string;
	notificationError?: string;
}

export interface RunSummary {
	total: number;
	counts: Record<StatusLabel, number>;
	notificationsSent: number;
	results: ServiceCheckResult[];
}
