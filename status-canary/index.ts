import type { Handler, ScheduledEvent } from 'aws-lambda';
import { type ActionInterface, ProdActions } from './actions';
import { handleCanary } from './canary';
import { type Config, loadConfig } from './config';
import type { CanaryConfig, RunSummary } from './types';

// exported for testing purposes
export function handlerWithActions(
	event: unknown,
	config: CanaryConfig,
	actions: ActionInterface,
): Promise<RunSummary> {
	if (isScheduledEvent(event)) {
		return handleCanary(config, actions);
	}

	return Promise.reject(new Error('unknown event'));
}

// built on first invocation, then reused for as long as the container lives
let prod: { config: Config; actions: ProdActions } | undefined;

function prodRuntime(): { config: Config; actions: ProdActions } {
	if (prod === undefined) {
		const config = loadConfig(process.env);
		prod = { config, actions: new ProdActions(config) };
	}

	return prod;
}

export const handler: Handler<ScheduledEvent, RunSummary> = (event) => {
	return Promise.resolve().then(() => {
		const { config, actions } = prodRuntime();

		return handlerWithActions(
			event,
			{ notificationDestination: config.notificationTopicArn },
			actions,
		);
	});
};

export function isScheduledEvent(input: unknown): input is ScheduledEvent {
	if (typeof input !== 'object' || input === null) {
		return false;
	}

	if (!('source' in input) || input.source !== 'aws.events') {
		return false;
	}

	if (
		!('detail-type' in input) ||
		input['detail-type'] !== 'Scheduled Event'
	) {
		return false;
	}

	return true;
}
