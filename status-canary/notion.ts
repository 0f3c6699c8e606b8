import { z } from 'zod';
import { errorToString, SourceFetchError, StatusUpdateError } from './errors';
import { httpRequest, type HttpRequester, type HttpResponse } from './http';
import {
	isStatusLabel,
	type RecordedStatus,
	type ServiceRecord,
	type StatusLabel,
} from './types';

export interface NotionConfig {
	apiBaseUrl: string;
	apiToken: string;
	databaseId: string;
	version: string;
}

const richTextSchema = z.array(
	z.object({
		plain_text: z.string().optional(),
		text: z.object({ content: z.string() }).optional(),
	}),
);

const httpUrlSchema = z
	.string()
	.url()
	.refine((value) => /^https?:\/\//i.test(value), {
		message: 'must start with http:// or https://',
	});

// property names match the columns of the monitored-services database
const servicePageSchema = z.object({
	id: z.string().min(1),
	properties: z.object({
		URL: z.object({ title: richTextSchema }),
		Identifier: z.object({ rich_text: richTextSchema }),
		Status: z
			.object({
				select: z.object({ name: z.string() }).nullish(),
			})
			.optional(),
	}),
});

const queryResponseSchema = z.object({
	results: z.array(z.unknown()),
	has_more: z.boolean().optional(),
	next_cursor: z.string().nullish(),
});

type ServicePage = z.infer<typeof servicePageSchema>;

export class NotionServiceStore {
	constructor(
		private readonly config: NotionConfig,
		private readonly log: (msg: string) => void,
		private readonly request: HttpRequester = httpRequest,
	) {}

	// https://developers.notion.com/reference/post-database-query
	async listServices(): Promise<ServiceRecord[]> {
		const services: ServiceRecord[] = [];
		let startCursor: string | undefined;

		do {
			const page = await this.queryDatabase(startCursor);

			for (const item of page.results) {
				const service = this.toServiceRecord(item);
				if (service !== undefined) {
					services.push(service);
				}
			}

			startCursor =
				page.has_more && page.next_cursor ? page.next_cursor : undefined;
		} while (startCursor !== undefined);

		return services;
	}

	// https://developers.notion.com/reference/patch-page
	async updateStatus(pageId: string, status: StatusLabel): Promise<void> {
		const payload = {
			properties: {
				Status: {
					select: {
						name: status,
					},
				},
			},
		};

		let res: HttpResponse;
		try {
			res = await this.request(
				`${this.config.apiBaseUrl}/pages/${encodeURIComponent(pageId)}`,
				{
					method: 'PATCH',
					headers: this.headers(),
					body: JSON.stringify(payload),
				},
			);
		} catch (err) {
			throw new StatusUpdateError(
				`Notion page update failed: ${errorToString(err)}`,
			);
		}

		if (res.statusCode < 200 || res.statusCode >= 300) {
			throw new StatusUpdateError(
				`Notion page update failed: HTTP ${res.statusCode}`,
				res.statusCode,
			);
		}
	}

	private async queryDatabase(
		startCursor: string | undefined,
	): Promise<z.infer<typeof queryResponseSchema>> {
		const url = `${this.config.apiBaseUrl}/databases/${encodeURIComponent(
			this.config.databaseId,
		)}/query`;

		let res: HttpResponse;
		try {
			res = await this.request(url, {
				method: 'POST',
				headers: this.headers(),
				body: JSON.stringify(
					startCursor !== undefined ? { start_cursor: startCursor } : {},
				),
			});
		} catch (err) {
			throw new SourceFetchError(
				`Notion database query failed: ${errorToString(err)}`,
			);
		}

		if (res.statusCode !== 200) {
			throw new SourceFetchError(
				`Notion database query failed: HTTP ${res.statusCode}`,
				res.statusCode,
			);
		}

		let json: unknown;
		try {
			json = JSON.parse(res.body);
		} catch {
			throw new SourceFetchError(
				'Notion database query failed: response is not JSON',
				res.statusCode,
			);
		}

		const parsed = queryResponseSchema.safeParse(json);
		if (!parsed.success) {
			throw new SourceFetchError(
				'Notion database query failed: unexpected response shape',
				res.statusCode,
			);
		}

		return parsed.data;
	}

	private toServiceRecord(item: unknown): ServiceRecord | undefined {
		const parsed = servicePageSchema.safeParse(item);
		if (!parsed.success) {
			this.log(
				`   skipping page ${pageIdOf(item)}: ${describeIssues(parsed.error)}`,
			);
			return undefined;
		}

		const page = parsed.data;
		const url = plainText(page.properties.URL.title);
		const identifier = plainText(page.properties.Identifier.rich_text);

		const urlValid = httpUrlSchema.safeParse(url);
		if (!urlValid.success) {
			this.log(
				`   skipping page ${page.id}: URL<${url}> ${describeIssues(
					urlValid.error,
				)}`,
			);
			return undefined;
		}

		if (identifier === '') {
			this.log(`   skipping page ${page.id}: Identifier is empty`);
			return undefined;
		}

		return {
			id: page.id,
			url,
			identifier,
			lastRecordedStatus: recordedStatusOf(page),
		};
	}

	private headers(): Record<string, string> {
		return {
			Authorization: `Bearer ${this.config.apiToken}`,
			'Content-Type': 'application/json',
			'Notion-Version': this.config.version,
		};
	}
}

// a service that was never checked has no Status at all
function recordedStatusOf(page: ServicePage): RecordedStatus {
	const name = page.properties.Status?.select?.name ?? '';

	return isStatusLabel(name) ? name : '';
}

function plainText(segments: z.infer<typeof richTextSchema>): string {
	return segments
		.map((segment) => segment.plain_text ?? segment.text?.content ?? '')
		.join('')
		.trim();
}

function pageIdOf(item: unknown): string {
	if (typeof item === 'object' && item !== null && 'id' in item) {
		return String(item.id);
	}

	return '<no id>';
}

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join('.')}: ${issue.message}`
				: issue.message,
		)
		.join('; ');
}
