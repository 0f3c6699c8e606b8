// the service list could not be read. nothing to process => fatal for the run
export class SourceFetchError extends Error {
	constructor(
		message: string,
		readonly statusCode?: number,
	) {
		super(message);
		this.name = 'SourceFetchError';
	}
}

export class StatusUpdateError extends Error {
	constructor(
		message: string,
		readonly statusCode?: number,
	) {
		super(message);
		this.name = 'StatusUpdateError';
	}
}

export function errorToString(err: unknown): string {
	return err instanceof Error ? err.toString() : String(err);
}
