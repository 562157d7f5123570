import { getLogger } from './logger.js';

const logger = getLogger();

/**
 * Error classification for HTTP responses.
 * Retryable failures are still final for a run; the flag is informational.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Fixed-delay rate limiter.
 * Calls run one at a time, and every call is followed by `delayMs` of quiet
 * before the next one starts.
 */
class FixedDelayLimiter {
    private lastCallEnded: number | null = null;
    private queue: Promise<void> = Promise.resolve();

    constructor(private readonly delayMs: number) {}

    run<T>(task: () => Promise<T>): Promise<T> {
        const result = this.queue.then(async () => {
            await this.wait();
            try {
                return await task();
            } finally {
                this.lastCallEnded = Date.now();
            }
        });
        // The next call waits for this one whether it succeeds or not
        this.queue = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }

    private async wait(): Promise<void> {
        if (this.lastCallEnded === null || this.delayMs <= 0) return;

        const waitMs = this.lastCallEnded + this.delayMs - Date.now();
        if (waitMs > 0) {
            await sleep(waitMs);
        }
    }
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source request counts
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * HTTP error with classification.
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

export interface HttpClientOptions {
    timeout?: number;
    delayMs?: number;
    version?: string;
    email?: string;
}

/**
 * Centralized HTTP client. All sources share one instance so that the fixed
 * delay applies across sources: the pipeline never has two calls in flight.
 */
export class HttpClient {
    private readonly limiter: FixedDelayLimiter;
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.limiter = new FixedDelayLimiter(options?.delayMs ?? 1000);
        const version = options?.version ?? '1.0.0';
        this.userAgent = options?.email
            ? `citenet/${version} (mailto:${options.email})`
            : `citenet/${version}`;
    }

    /**
     * Make a single GET request after the rate-limit delay. No retries.
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        return this.limiter.run(() => this.send<T>(url, options));
    }

    private async send<T>(url: string, options: HttpRequestOptions): Promise<HttpResponse<T>> {
        const { headers = {}, timeout = this.defaultTimeout, source = 'default' } = options;

        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers: requestHeaders,
                signal: controller.signal,
            });

            const contentType = response.headers.get('content-type') ?? '';
            let data: T;
            if (contentType.includes('json')) {
                data = (await response.json()) as T;
            } else {
                data = (await response.text()) as T;
            }

            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    RETRYABLE_STATUS_CODES.has(response.status),
                    data
                );
            }

            return { status: response.status, headers: responseHeaders, data, ok: true };
        } catch (error) {
            if (error instanceof HttpError) throw error;

            if (error instanceof Error && error.name === 'AbortError') {
                throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
            }

            const code = errorCode(error);
            logger.debug({ url, code }, 'Network error');
            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0,
                code ? RETRYABLE_ERROR_CODES.has(code) : false
            );
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T = unknown>(url: string, options?: HttpRequestOptions): Promise<HttpResponse<T>> {
        return this.request<T>(url, options);
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    resetCounts(): void {
        this.requestCounts.clear();
    }
}

/**
 * Node socket errors surface as `code` on the error or on its `cause` (undici).
 */
function errorCode(error: unknown): string | undefined {
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate) {
            const { code } = candidate;
            if (typeof code === 'string') return code;
        }
    }
    return undefined;
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance. Options apply on first call only.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
