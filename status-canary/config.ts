import { z } from 'zod';
import { defaultTimeoutMs } from './http';
import type { NotionConfig } from './notion';

export interface Config {
	notion: NotionConfig;
	notificationTopicArn: string;
	awsRegion?: string;
	probeTimeoutMs: number;
}

const envSchema = z.object({
	NOTION_API_TOKEN: z.string().min(1),
	NOTION_DATABASE_ID: z.string().min(1),
	NOTION_API_BASE_URL: z
		.string()
		.url()
		.default('https://api.notion.com/v1'),
	NOTION_VERSION: z.string().min(1).default('2021-05-13'),
	SNS_TOPIC_ARN: z.string().min(1),
	AWS_REGION: z.string().optional(),
	PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(defaultTimeoutMs),
});

const tips: Record<string, string> = {
	NOTION_API_TOKEN: 'Create an internal integration and share the database with it',
	NOTION_DATABASE_ID: 'The 32 character id in the database URL',
	SNS_TOPIC_ARN: 'e.g. arn:aws:sns:us-east-1:123456789012:status-alerts',
	PROBE_TIMEOUT_MS: 'Use a positive integer; defaults to 8000 if unset',
};

// called once at startup. nothing else reads process.env
export function loadConfig(env: NodeJS.ProcessEnv): Config {
	const result = envSchema.safeParse(env);
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => {
				const keyName = String(issue.path[0] ?? issue.code);
				const tip = tips[keyName] ? ` Tip: ${tips[keyName]}.` : '';
				return `- ${keyName}: ${issue.message}.${tip}`;
			})
			.join('\n');

		throw new Error(`Environment validation failed:\n${details}`);
	}

	const parsed = result.data;

	return {
		notion: {
			apiBaseUrl: parsed.NOTION_API_BASE_URL.replace(/\/+$/, ''),
			apiToken: parsed.NOTION_API_TOKEN.trim(),
			databaseId: parsed.NOTION_DATABASE_ID.trim(),
			version: parsed.NOTION_VERSION.trim(),
		},
		notificationTopicArn: parsed.SNS_TOPIC_ARN.trim(),
		awsRegion: parsed.AWS_REGION?.trim() || undefined,
		probeTimeoutMs: parsed.PROBE_TIMEOUT_MS,
	};
}
