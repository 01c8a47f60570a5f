export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseRetryAfterMs(value: string | null): number | null {
	if (!value) return null;

	// Retry-After can be either seconds or an HTTP date.
	const asSeconds = Number(value);
	if (!Number.isNaN(asSeconds) && asSeconds >= 0) return asSeconds * 1000;

	const asDate = Date.parse(value);
	if (!Number.isNaN(asDate)) {
		const ms = asDate - Date.now();
		return ms > 0 ? ms : 0;
	}

	return null;
}

function backoffMs(attempt: number, baseMs: number, capMs: number): number {
	// Exponential backoff with jitter
	const exp = Math.min(capMs, baseMs * 2 ** attempt);
	const jitter = Math.floor(Math.random() * Math.min(250, exp));
	return exp + jitter;
}

export type RetryOptions = {
	fetchFn?: FetchFn;
	sleepFn?: SleepFn;

	maxRetries?: number;
	baseBackoffMs?: number;
	maxBackoffMs?: number;

	/** Retry on 5xx too (429 is always retried). */
	retryOn5xx?: boolean;
};

/**
 * GET with retries on 429 (and 5xx by default).
 * Other statuses are returned as-is; the caller decides what a non-ok response means.
 */
export async function fetchWithRetry(
	url: string,
	init: RequestInit = {},
	options: RetryOptions = {},
): Promise<Response> {
	const {
		fetchFn = fetch,
		sleepFn = sleep,
		maxRetries = 5,
		baseBackoffMs = 500,
		maxBackoffMs = 8_000,
		retryOn5xx = true,
	} = options;

	let attempt = 0;
	for (;;) {
		const res = await fetchFn(url, init);
		if (res.ok) return res;

		const status = res.status;
		const shouldRetry = status === 429 || (retryOn5xx && status >= 500 && status <= 599);

		if (!shouldRetry || attempt >= maxRetries) return res;

		// Respect Retry-After when present (especially for 429)
		const retryAfter = parseRetryAfterMs(res.headers.get('retry-after'));

		// Always drain body before retrying
		await res.text().catch(() => '');

		await sleepFn(retryAfter ?? backoffMs(attempt, baseBackoffMs, maxBackoffMs));
		attempt++;
	}
}
