import { describe, expect, it } from 'vitest';
import { exitFailure, exitOk, runOnce } from './cli';
import { service, TestMockActions, testTopicArn } from './test-actions';

const config = { notificationDestination: testTopicArn };

describe('runOnce', () => {
	it('exits 0 even when services are down', async () => {
		const actions = new TestMockActions(
			[service('1', 'https://down.example.com/', 'x', 'Operational')],
			{
				'https://down.example.com/': {
					kind: 'no-response',
					reason: 'Error: connect ECONNREFUSED 127.0.0.1:443',
				},
			},
		);
		actions.failStatusUpdatesFor.add('1');

		expect(await runOnce(config, actions)).toBe(exitOk);
		expect(actions.notifications).toEqual([
			{
				destination: testTopicArn,
				message: 'Status for https://down.example.com/ is Down.',
			},
		]);
	});

	it('exits non-zero when the service list is unavailable', async () => {
		const actions = new TestMockActions([], {});
		actions.sourceUnavailable = true;

		expect(await runOnce(config, actions)).toBe(exitFailure);
		expect(actions.errorMessages).toEqual([
			'=> run aborted: SourceFetchError: Notion database query failed: HTTP 401',
		]);
		expect(actions.logMessages).toEqual([]);
	});
});
