import type { ActionInterface } from './actions';
import { handleCanary } from './canary';
import { errorToString } from './errors';
import type { CanaryConfig } from './types';

export const exitOk = 0;
export const exitFailure = 1;

// a completed run is a success even when services are down: the canary did its
// job. only not being able to get the service list at all is a failure.
export function runOnce(
	config: CanaryConfig,
	actions: ActionInterface,
): Promise<number> {
	return handleCanary(config, actions).then(
		() => exitOk,
		(err: unknown) => {
			actions.error(`=> run aborted: ${errorToString(err)}`);
			return exitFailure;
		},
	);
}
