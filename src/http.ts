// src/http.ts
//
// Shared HTTP plumbing for the machine poller and webhook delivery: one
// request with a hard timeout, classified failures, redacted snippets.

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

const SANITIZE = {
    ERROR_SNIPPET_MAX_CHARS: 500,
    STRIP_PATTERNS: [
        /\b\d{1,3}(?:\.\d{1,3}){3}\b/g,
        /[a-fA-F0-9]{32,}/g,
        /Authorization:\s*Bearer\s+[A-Za-z0-9._-]+/gi,
        /https:\/\/discord(?:app)?\.com\/api\/webhooks\/\S+/gi,
    ],
};

export function sanitizeErrorSnippet(input: string): string {
    let out = input || '';
    for (const re of SANITIZE.STRIP_PATTERNS) {
        out = out.replace(re, '[REDACTED]');
    }
    if (out.length > SANITIZE.ERROR_SNIPPET_MAX_CHARS) {
        out = out.slice(0, SANITIZE.ERROR_SNIPPET_MAX_CHARS);
    }
    out = out.replace(/[^\x20-\x7E]+/g, ' ');
    return out;
}

export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number | null,
        public readonly retryable: boolean,
        public readonly snippet: string | null = null
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/** Server errors, rate limits and network failures are worth another try. */
export function isRetryable(err: unknown): boolean {
    return err instanceof HttpError ? err.retryable : true;
}

/**
 * Run one request with an abort timer. Non-2xx responses become HttpError;
 * the body text is returned on success.
 */
export async function requestText(fetchFn: FetchFn, url: string, init: RequestInit, timeoutMs: number): Promise<string> {
    const ac = new AbortController();
    const tid = setTimeout(() => ac.abort(), timeoutMs);

    try {
        let resp: Response;
        try {
            resp = await fetchFn(url, { ...init, signal: ac.signal });
        } catch (e) {
            const isTimeout = e instanceof Error && e.name === 'AbortError';
            const msg = isTimeout
                ? `timeout after ${timeoutMs}ms`
                : `network_error: ${sanitizeErrorSnippet(e instanceof Error ? e.message : String(e))}`;
            throw new HttpError(msg, null, true);
        }

        const bodyText = await resp.text();
        if (!resp.ok) {
            const snippet = sanitizeErrorSnippet(bodyText);
            const retryable = resp.status >= 500 || resp.status === 429;
            throw new HttpError(`HTTP ${resp.status}`, resp.status, retryable, snippet);
        }
        return bodyText;
    } finally {
        clearTimeout(tid);
    }
}
