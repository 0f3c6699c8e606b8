import { errorToString } from './errors';
import { httpRequest } from './http';
import type { ProbeResult } from './types';

const userAgent = 'status-canary/1.0';

// redirect loops end up as "no response" once this runs out
const maxRedirects = 30;

// never rejects: every network-level failure is a "no response" probe
export async function probeUrl(
	url: string,
	timeoutMs: number,
): Promise<ProbeResult> {
	try {
		const res = await httpRequest(url, {
			method: 'GET',
			headers: { 'User-Agent': userAgent },
			timeoutMs,
			maxRedirects,
		});

		return { kind: 'response', statusCode: res.statusCode, body: res.body };
	} catch (err) {
		return { kind: 'no-response', reason: errorToString(err) };
	}
}
