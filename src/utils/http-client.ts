import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
}

/**
 * HTTP response wrapper. `data` is parsed JSON for JSON responses and
 * the body text otherwise; callers validate it before use.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
    ok: boolean;
}

export interface HttpClientOptions {
    timeout?: number;
    retries?: number;
    retryDelayMs?: number;
    version?: string;
    email?: string;
}

/**
 * HTTP error with classification.
 * Status 0 means no response was received (network failure or timeout).
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Centralized HTTP client with per-call timeout and a fixed number of retries.
 */
export class HttpClient {
    private requestCount = 0;
    private readonly defaultTimeout: number;
    private readonly retries: number;
    private readonly retryDelayMs: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.retries = options?.retries ?? 2;
        this.retryDelayMs = options?.retryDelayMs ?? 500;
        const version = options?.version ?? '0.1.0';
        this.userAgent = options?.email
            ? `get-papers-list/${version} (mailto:${options.email})`
            : `get-papers-list/${version}`;
    }

    /**
     * Make a GET request, retrying network errors, timeouts and
     * retryable status codes up to the configured number of times.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { headers = {}, timeout = this.defaultTimeout } = options;

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        const logger = getLogger();

        for (let attempt = 0; attempt <= this.retries; attempt++) {
            this.requestCount += 1;

            try {
                const response = await this.send(url, requestHeaders, timeout);

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < this.retries) {
                        logger.warn(
                            { status: response.status, attempt: attempt + 1, delayMs: this.retryDelayMs, url },
                            'Retryable HTTP error, retrying'
                        );
                        await sleep(this.retryDelayMs);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        response.data
                    );
                }

                logger.debug({ url, status: response.status }, 'HTTP request succeeded');
                return response;
            } catch (error) {
                if (error instanceof HttpError && error.status !== 0) throw error;

                const failure = error instanceof HttpError
                    ? error
                    : new HttpError(
                        `Network error: ${error instanceof Error ? error.message : String(error)}`,
                        0,
                        true
                    );

                if (attempt < this.retries) {
                    logger.warn(
                        { reason: failure.message, attempt: attempt + 1, delayMs: this.retryDelayMs, url },
                        'Request failed, retrying'
                    );
                    await sleep(this.retryDelayMs);
                    continue;
                }

                throw failure;
            }
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    /**
     * Number of HTTP attempts made so far, retries included.
     */
    getRequestCount(): number {
        return this.requestCount;
    }

    /**
     * Reset request count.
     */
    resetCount(): void {
        this.requestCount = 0;
    }

    private async send(
        url: string,
        headers: Record<string, string>,
        timeout: number
    ): Promise<HttpResponse & { statusText: string }> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, { method: 'GET', headers, signal: controller.signal });

            const contentType = response.headers.get('content-type') ?? '';
            const text = await response.text();
            const data: unknown = contentType.includes('json') ? parseJson(text) : text;

            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            return {
                status: response.status,
                statusText: response.statusText,
                headers: responseHeaders,
                data,
                ok: response.ok,
            };
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }
}

/**
 * JSON bodies that fail to parse are handed back as text for the caller to reject.
 */
function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
