import { describe, expect, it } from 'vitest';
import { handleCanary } from './canary';
import { SourceFetchError } from './errors';
import { service, TestMockActions, testTopicArn } from './test-actions';
import type { ProbeResult } from './types';

const config = { notificationDestination: testTopicArn };

function fleet(): TestMockActions {
	return new TestMockActions(
		[
			service('1', 'https://ok.example.com/', 'Welcome', 'Operational'),
			service('2', 'https://portal.example.com/', 'Dashboard'),
			service('3', 'https://missing.example.com/', 'anything', 'Warning'),
			service('4', 'https://maint.example.com/', 'anything', 'Operational'),
			service('5', 'https://timeout.example.net/', 'foo', 'Operational'),
		],
		{
			'https://ok.example.com/': {
				kind: 'response',
				statusCode: 200,
				body: 'welcome aboard',
			},
			'https://portal.example.com/': {
				kind: 'response',
				statusCode: 200,
				body: 'Sign in to the Wi-Fi',
			},
			'https://missing.example.com/': {
				kind: 'response',
				statusCode: 404,
				body: 'not found',
			},
			'https://maint.example.com/': {
				kind: 'response',
				statusCode: 503,
				body: 'back soon',
			},
			'https://timeout.example.net/': {
				kind: 'no-response',
				reason: 'Error: Faking timeout',
			},
		},
	);
}

describe('handleCanary', () => {
	it('classifies, persists and notifies changes', async () => {
		const actions = fleet();

		const summary = await handleCanary(config, actions);

		expect(actions.logMessages).toEqual([
			'✓  https://ok.example.com/ @ 0ms => Operational (HTTP 200)',
			'✗  https://portal.example.com/ @ 0ms => Doubtful (HTTP 200, identifier<Dashboard> NOT in body)',
			'✗  https://missing.example.com/ @ 0ms => Warning (HTTP 404)',
			'✗  https://maint.example.com/ @ 0ms => Maintenance (HTTP 503)',
			'✗  https://timeout.example.net/ @ 0ms => Down (Error: Faking timeout)',
			'=> FAIL (1/5) operational',
		]);

		expect(actions.statusUpdates).toEqual([
			{ serviceId: '1', status: 'Operational' },
			{ serviceId: '2', status: 'Doubtful' },
			{ serviceId: '3', status: 'Warning' },
			{ serviceId: '4', status: 'Maintenance' },
			{ serviceId: '5', status: 'Down' },
		]);

		expect(actions.notifications).toEqual([
			{
				destination: testTopicArn,
				message: 'Status for https://portal.example.com/ is Doubtful.',
			},
			{
				destination: testTopicArn,
				message: 'Status for https://maint.example.com/ is Maintenance.',
			},
			{
				destination: testTopicArn,
				message: 'Status for https://timeout.example.net/ is Down.',
			},
		]);

		expect(summary.total).toBe(5);
		expect(summary.counts).toEqual({
			Operational: 1,
			Doubtful: 1,
			Warning: 1,
			Maintenance: 1,
			Down: 1,
		});
		expect(summary.notificationsSent).toBe(3);
		expect(summary.results.map((result) => result.deliveryId)).toEqual([
			undefined,
			'msg-1',
			undefined,
			'msg-2',
			'msg-3',
		]);
	});

	it('is silent on a second run against unchanged endpoints', async () => {
		const actions = fleet();

		await handleCanary(config, actions);
		const second = await handleCanary(config, actions);

		expect(actions.notifications.length).toBe(3);
		expect(second.notificationsSent).toBe(0);
		expect(actions.statusUpdates.length).toBe(10);
	});

	it('notifies again once a service recovers', async () => {
		const actions = fleet();

		await handleCanary(config, actions);
		actions.probes['https://timeout.example.net/'] = {
			kind: 'response',
			statusCode: 200,
			body: 'FOO bar',
		};
		await handleCanary(config, actions);

		expect(actions.notifications.map((n) => n.message)).toEqual([
			'Status for https://portal.example.com/ is Doubtful.',
			'Status for https://maint.example.com/ is Maintenance.',
			'Status for https://timeout.example.net/ is Down.',
			'Status for https://timeout.example.net/ is Operational.',
		]);
	});

	it('keeps going when status updates or notifications fail', async () => {
		const actions = fleet();
		actions.failStatusUpdatesFor.add('2');
		actions.failNotificationsFor.add('https://maint.example.com/');

		const summary = await handleCanary(config, actions);

		expect(actions.logMessages).toContain(
			'   status update failed for https://portal.example.com/: StatusUpdateError: Notion page update failed: HTTP 500',
		);
		expect(actions.logMessages).toContain(
			'   notification failed for https://maint.example.com/: Error: Faking SNS outage',
		);
		expect(actions.logMessages[actions.logMessages.length - 1]).toBe(
			'=> FAIL (1/5) operational',
		);

		const portal = summary.results[1];
		expect(portal.statusUpdateError).toBe(
			'StatusUpdateError: Notion page update failed: HTTP 500',
		);
		expect(portal.deliveryId).toBe('msg-1');

		const maint = summary.results[3];
		expect(maint.notificationError).toBe('Error: Faking SNS outage');
		expect(maint.deliveryId).toBeUndefined();

		expect(summary.notificationsSent).toBe(2);
		expect(actions.statusUpdates.map((update) => update.serviceId)).toEqual([
			'1',
			'3',
			'4',
			'5',
		]);
	});

	it('treats a probe that throws as no response', async () => {
		const actions = new TestMockActions(
			[service('9', 'https://unmapped.example.com/', 'x', 'Down')],
			{},
		);

		const summary = await handleCanary(config, actions);

		expect(summary.results[0].status).toBe('Down');
		expect(actions.logMessages).toEqual([
			'✗  https://unmapped.example.com/ @ 0ms => Down (Error: unknown url: https://unmapped.example.com/)',
			'=> FAIL (0/1) operational',
		]);
		expect(actions.notifications).toEqual([]);
	});

	it('truncates long failure reasons to one line', async () => {
		const reason = `Error: first line\n${'x'.repeat(200)}`;
		const probes: Record<string, ProbeResult> = {
			'https://noisy.example.com/': { kind: 'no-response', reason },
		};
		const actions = new TestMockActions(
			[service('7', 'https://noisy.example.com/', 'x', 'Down')],
			probes,
		);

		await handleCanary(config, actions);

		const expectedDetail = reason.replace(/\n/g, '\\n').slice(0, 126) + '..';
		expect(actions.logMessages[0]).toBe(
			`✗  https://noisy.example.com/ @ 0ms => Down (${expectedDetail})`,
		);
	});

	it('reports an all-operational run', async () => {
		const actions = new TestMockActions(
			[service('1', 'https://ok.example.com/', 'ok', 'Operational')],
			{
				'https://ok.example.com/': { kind: 'response', statusCode: 200, body: 'OK' },
			},
		);

		await handleCanary(config, actions);

		expect(actions.logMessages).toEqual([
			'✓  https://ok.example.com/ @ 0ms => Operational (HTTP 200)',
			'=> All operational (1/1)',
		]);
	});

	it('handles an empty service list', async () => {
		const actions = new TestMockActions([], {});

		const summary = await handleCanary(config, actions);

		expect(summary.total).toBe(0);
		expect(actions.logMessages).toEqual(['=> No services to check']);
	});

	it('rejects when the service list cannot be fetched', async () => {
		const actions = fleet();
		actions.sourceUnavailable = true;

		await expect(handleCanary(config, actions)).rejects.toBeInstanceOf(
			SourceFetchError,
		);
		expect(actions.statusUpdates).toEqual([]);
	});
});
