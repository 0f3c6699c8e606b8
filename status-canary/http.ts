import * as http from 'http';
import * as https from 'https';
import { TextDecoder } from 'util';

export interface HttpRequestOptions {
	method?: string;
	headers?: Record<string, string>;
	body?: string;
	// wall-clock budget for the whole exchange, redirects included
	timeoutMs?: number;
	maxRedirects?: number;
}

export interface HttpResponse {
	statusCode: number;
	headers: http.IncomingHttpHeaders;
	body: string;
}

export type HttpRequester = (
	remoteUrl: string,
	options?: HttpRequestOptions,
) => Promise<HttpResponse>;

export const defaultTimeoutMs = 8000;

const redirectStatuses = [301, 302, 303, 307, 308];

export function httpRequest(
	remoteUrl: string,
	options: HttpRequestOptions = {},
): Promise<HttpResponse> {
	const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;

	return requestOnce(
		remoteUrl,
		options,
		timeoutMs,
		Date.now() + timeoutMs,
		options.maxRedirects ?? 0,
	);
}

function requestOnce(
	remoteUrl: string,
	options: HttpRequestOptions,
	timeoutMs: number,
	deadline: number,
	redirectsLeft: number,
): Promise<HttpResponse> {
	return new Promise<HttpResponse>((resolve, reject) => {
		// throws on malformed URLs, which rejects this promise
		const urlParsed = new URL(remoteUrl);

		const remainingMs = deadline - Date.now();
		if (remainingMs <= 0) {
			reject(new Error(`Timeout after ${timeoutMs}ms`));
			return;
		}

		const req = requestHttpOrHttps(
			urlParsed,
			{
				method: options.method ?? 'GET',
				headers: options.headers,
			},
			(res) => {
				const statusCode = res.statusCode ?? 0;
				const location = res.headers.location;

				const maxRedirects = options.maxRedirects ?? 0;

				if (
					maxRedirects > 0 &&
					redirectStatuses.includes(statusCode) &&
					location !== undefined
				) {
					// we don't care about the body of the redirect response
					res.resume();
					clearTimeout(timer);

					if (redirectsLeft === 0) {
						reject(new Error(`Exceeded ${maxRedirects} redirects`));
						return;
					}

					let nextUrl: string;
					try {
						nextUrl = new URL(location, urlParsed).toString();
					} catch (err) {
						reject(err);
						return;
					}

					requestOnce(
						nextUrl,
						redirectedOptions(options, statusCode),
						timeoutMs,
						deadline,
						redirectsLeft - 1,
					).then(resolve, reject);
					return;
				}

				const chunks: Buffer[] = [];

				res.on('error', (err) => {
					clearTimeout(timer);
					reject(err);
				});

				res.on('data', (chunk: Buffer) => {
					chunks.push(chunk);
				});

				res.on('end', () => {
					clearTimeout(timer);
					resolve({
						statusCode,
						headers: res.headers,
						body: decodeBody(
							Buffer.concat(chunks),
							res.headers['content-type'],
						),
					});
				});
			},
		);

		const timer = setTimeout(() => {
			req.destroy(new Error(`Timeout after ${timeoutMs}ms`));
		}, remainingMs);

		req.on('error', (err) => {
			clearTimeout(timer);
			reject(err);
		});

		if (options.body !== undefined) {
			req.write(options.body);
		}

		req.end();
	});
}

// "text/html; charset=ISO-8859-1" => "iso-8859-1"
export function charsetFrom(
	contentType: string | undefined,
): string | undefined {
	if (contentType === undefined) {
		return undefined;
	}

	const match = /;\s*charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType);

	return match === null ? undefined : match[1].toLowerCase();
}

// unknown or missing charset labels decode as UTF-8
export function decodeBody(
	raw: Uint8Array,
	contentType: string | undefined,
): string {
	let decoder: TextDecoder;
	try {
		decoder = new TextDecoder(charsetFrom(contentType) ?? 'utf-8');
	} catch (err) {
		if (!(err instanceof RangeError)) {
			throw err;
		}
		decoder = new TextDecoder('utf-8');
	}

	return decoder.decode(raw);
}

// 301/302/303 turn into a body-less GET, 307/308 replay the request as-is
function redirectedOptions(
	options: HttpRequestOptions,
	statusCode: number,
): HttpRequestOptions {
	if (statusCode === 307 || statusCode === 308) {
		return options;
	}

	return { ...options, method: 'GET', body: undefined };
}

function requestHttpOrHttps(
	remoteUrl: URL,
	options: http.RequestOptions,
	callback: (res: http.IncomingMessage) => void,
): http.ClientRequest {
	if (remoteUrl.protocol === 'http:') {
		return http.request(remoteUrl, options, callback);
	} else if (remoteUrl.protocol === 'https:') {
		return https.request(remoteUrl, options, callback);
	}

	throw new Error(`Unknown protocol in URL: ${remoteUrl.toString()}`);
}
