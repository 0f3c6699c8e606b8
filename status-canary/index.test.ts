import { describe, expect, it } from 'vitest';
import { handlerWithActions, isScheduledEvent } from './index';
import {
	mockScheduledEvent,
	service,
	TestMockActions,
	testTopicArn,
} from './test-actions';

const config = { notificationDestination: testTopicArn };

describe('handlerWithActions', () => {
	it('runs the canary for scheduled events', async () => {
		const actions = new TestMockActions(
			[service('1', 'https://ok.example.com/', 'ok')],
			{
				'https://ok.example.com/': { kind: 'response', statusCode: 200, body: 'OK' },
			},
		);

		const summary = await handlerWithActions(mockScheduledEvent(), config, actions);

		expect(summary.counts.Operational).toBe(1);
		expect(actions.notifications).toEqual([
			{
				destination: testTopicArn,
				message: 'Status for https://ok.example.com/ is Operational.',
			},
		]);
	});

	it('rejects anything else', async () => {
		const actions = new TestMockActions([], {});

		await expect(
			handlerWithActions({ httpMethod: 'GET', path: '/config' }, config, actions),
		).rejects.toThrow('unknown event');
		expect(actions.logMessages).toEqual([]);
	});
});

describe('isScheduledEvent', () => {
	it('recognizes EventBridge schedules only', () => {
		expect(isScheduledEvent(mockScheduledEvent())).toBe(true);
		expect(
			isScheduledEvent({ source: 'aws.events', 'detail-type': 'Object Created' }),
		).toBe(false);
		expect(isScheduledEvent({ source: 'custom', 'detail-type': 'Scheduled Event' })).toBe(
			false,
		);
		expect(isScheduledEvent(null)).toBe(false);
		expect(isScheduledEvent('aws.events')).toBe(false);
	});
});
