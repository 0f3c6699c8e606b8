import type { ProbeResult, StatusLabel } from './types';

export function classify(probe: ProbeResult, identifier: string): StatusLabel {
	if (probe.kind === 'no-response') {
		return 'Down';
	}

	const { statusCode, body } = probe;
	const successful = statusCode >= 200 && statusCode < 400;

	if (successful && containsIgnoringCase(body, identifier)) {
		return 'Operational';
	} else if (successful) {
		// answered, but not with the page we expected (captive portal, default page..)
		return 'Doubtful';
	} else if (statusCode >= 400 && statusCode < 500) {
		return 'Warning';
	} else if (statusCode === 503) {
		return 'Maintenance';
	}

	return 'Down';
}

function containsIgnoringCase(haystack: string, needle: string): boolean {
	return haystack.toLowerCase().indexOf(needle.toLowerCase()) !== -1;
}
