import type { ActionInterface } from './actions';
import { classify } from './classify';
import { errorToString } from './errors';
import { decideNotification } from './notify';
import type {
	CanaryConfig,
	ProbeResult,
	RunSummary,
	ServiceCheckResult,
	ServiceRecord,
	StatusLabel,
} from './types';

// probe => classify => persist => notify, for one service. never rejects, so one
// broken service can't take down the others.
async function checkOne(
	service: ServiceRecord,
	config: CanaryConfig,
	actions: ActionInterface,
): Promise<ServiceCheckResult> {
	const timeStarted = now();

	let probe: ProbeResult;
	try {
		probe = await actions.probe(service.url);
	} catch (err) {
		probe = { kind: 'no-response', reason: errorToString(err) };
	}

	const durationMs = actions.measureDuration(now(), timeStarted);

	const status = classify(probe, service.identifier);

	const logMsgSucceededSign = status === 'Operational' ? '✓' : '✗';
	const logMsgDetails = describeProbe(probe, service.identifier, status);

	actions.log(
		`${logMsgSucceededSign}  ${service.url} @ ${durationMs}ms => ${status} (${logMsgDetails})`,
	);

	const result: ServiceCheckResult = { service, probe, status, durationMs };

	try {
		await actions.updateStatus(service.id, status);
	} catch (err) {
		result.statusUpdateError = errorToString(err);
		actions.log(
			`   status update failed for ${service.url}: ${result.statusUpdateError}`,
		);
	}

	const intent = decideNotification(service, status);
	if (intent !== undefined) {
		try {
			result.deliveryId = await actions.sendNotification(
				config.notificationDestination,
				intent.message,
			);
		} catch (err) {
			result.notificationError = errorToString(err);
			actions.log(
				`   notification failed for ${service.url}: ${result.notificationError}`,
			);
		}
	}

	return result;
}

// rejects only when the service list itself can't be fetched
export function handleCanary(
	config: CanaryConfig,
	actions: ActionInterface,
): Promise<RunSummary> {
	return actions.listServices().then((services) => {
		// runs all checks in parallel
		const allChecksPromises: Array<Promise<ServiceCheckResult>> = services.map(
			(service) => checkOne(service, config, actions),
		);

		return Promise.all(allChecksPromises).then((results) => {
			const summary = summarize(results);
			const numOperational = summary.counts.Operational;

			if (summary.total === 0) {
				actions.log('=> No services to check');
			} else if (numOperational === summary.total) {
				actions.log(`=> All operational (${numOperational}/${summary.total})`);
			} else {
				actions.log(
					'=> FAIL (' + numOperational + '/' + summary.total + ') operational',
				);
			}

			return summary;
		});
	});
}

function summarize(results: ServiceCheckResult[]): RunSummary {
	const counts: Record<StatusLabel, number> = {
		Operational: 0,
		Doubtful: 0,
		Warning: 0,
		Maintenance: 0,
		Down: 0,
	};

	for (const result of results) {
		counts[result.status]++;
	}

	return {
		total: results.length,
		counts,
		notificationsSent: results.filter(
			(result) => result.deliveryId !== undefined,
		).length,
		results,
	};
}

function describeProbe(
	probe: ProbeResult,
	identifier: string,
	status: StatusLabel,
): string {
	if (probe.kind === 'no-response') {
		return truncate(oneLinerize(probe.reason), 128);
	}

	if (status === 'Doubtful') {
		return `HTTP ${probe.statusCode}, identifier<${identifier}> NOT in body`;
	}

	return `HTTP ${probe.statusCode}`;
}

function oneLinerize(input: string): string {
	return input.replace(/\n/g, '\\n');
}

function truncate(input: string, to: number): string {
	return to >= input.length ? input : input.slice(0, to - 2) + '..';
}

function now(): number {
	return new Date().getTime();
}
