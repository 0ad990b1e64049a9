import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import * as http from 'http';
import * as https from 'https';
import { FailureKind } from '../enums/failure-kind.enum';
import { Failure, FetchResult, HeadResult, HeadSuccess } from '../interfaces/fetch.interface';
import { DEFAULT_USER_AGENT, FETCH_DEFAULTS } from '../config/env.validation';
import { isRecord } from '../utils/type.util';
import { invalidUrl, parseHttpUrl, unexpectedFailure } from '../utils/url.util';
import { RateGate } from './rate-gate';

export const CONTENT_TOO_LARGE = 'Content too large';

interface Session {
    client: AxiosInstance;
    httpAgent: http.Agent;
    httpsAgent: https.Agent;
}

/**
 * Rate-limited HTTP client sharing one keep-alive connection pool across calls.
 *
 * Every request, HEAD or GET, to any host, passes through the same {@link RateGate}.
 * Transport failures come back as `ok: false` results instead of exceptions.
 */
@Injectable()
export class HttpClientService implements OnModuleDestroy {
    private readonly logger = new Logger(HttpClientService.name);
    private readonly gate: RateGate;
    private readonly timeoutMs: number;
    private readonly maxBodyBytes: number;
    private readonly poolSize: number;
    private readonly maxRedirects: number;
    private readonly userAgent: string;
    private session: Session | null = null;

    constructor(private readonly configService: ConfigService) {
        this.timeoutMs = this.configService.get<number>('FETCH_TIMEOUT_MS', FETCH_DEFAULTS.timeoutMs);
        this.maxBodyBytes = this.configService.get<number>('FETCH_MAX_BODY_BYTES', FETCH_DEFAULTS.maxBodyBytes);
        this.poolSize = this.configService.get<number>('FETCH_POOL_SIZE', FETCH_DEFAULTS.poolSize);
        this.maxRedirects = this.configService.get<number>('FETCH_MAX_REDIRECTS', FETCH_DEFAULTS.maxRedirects);
        this.userAgent = this.configService.get<string>('FETCH_USER_AGENT', DEFAULT_USER_AGENT);
        this.gate = new RateGate(this.configService.get<number>('FETCH_MIN_INTERVAL_MS', FETCH_DEFAULTS.minIntervalMs));
    }

    get isOpen(): boolean {
        return this.session !== null;
    }

    async head(url: string): Promise<HeadResult> {
        if (!parseHttpUrl(url)) {
            return invalidUrl(url);
        }

        try {
            await this.gate.acquire();
            const response = await this.open().client.head(url, {
                signal: AbortSignal.timeout(this.timeoutMs),
            });
            return this.describe(url, response);
        } catch (error) {
            return this.toFailure(url, error);
        }
    }

    async get(url: string): Promise<FetchResult> {
        if (!parseHttpUrl(url)) {
            return invalidUrl(url);
        }

        try {
            await this.gate.acquire();
            const response = await this.open().client.get<ArrayBuffer>(url, {
                responseType: 'arraybuffer',
                signal: AbortSignal.timeout(this.timeoutMs),
            });

            // The body is read in full first; the cap bounds what reaches the caller.
            const body = Buffer.from(response.data);
            if (body.byteLength > this.maxBodyBytes) {
                this.logger.warn(`Content too large for ${url}: ${body.byteLength} bytes`);
                return {
                    ok: false,
                    url,
                    kind: FailureKind.RESOURCE_LIMIT,
                    error: CONTENT_TOO_LARGE,
                    status: response.status,
                };
            }

            return { ...this.describe(url, response), body };
        } catch (error) {
            return this.toFailure(url, error);
        }
    }

    /**
     * Releases pooled sockets. Safe to call repeatedly; the next request opens a new pool.
     */
    async close(): Promise<void> {
        if (!this.session) {
            return;
        }
        const { httpAgent, httpsAgent } = this.session;
        this.session = null;
        httpAgent.destroy();
        httpsAgent.destroy();
        this.logger.debug('Connection pool closed');
    }

    onModuleDestroy(): Promise<void> {
        return this.close();
    }

    private open(): Session {
        if (this.session) {
            return this.session;
        }

        const agentOptions = { keepAlive: true, maxSockets: this.poolSize, scheduling: 'lifo' as const };
        const httpAgent = new http.Agent(agentOptions);
        const httpsAgent = new https.Agent(agentOptions);
        const client = axios.create({
            timeout: this.timeoutMs,
            maxRedirects: this.maxRedirects,
            httpAgent,
            httpsAgent,
            headers: {
                'User-Agent': this.userAgent,
                Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.5',
            },
            // Any status is a response; callers branch on it.
            validateStatus: () => true,
        });

        this.session = { client, httpAgent, httpsAgent };
        this.logger.debug(`Connection pool opened (maxSockets: ${this.poolSize})`);
        return this.session;
    }

    private describe(url: string, response: AxiosResponse): HeadSuccess {
        return {
            ok: true,
            url,
            finalUrl: this.finalUrlOf(response, url),
            status: response.status,
            headers: this.flattenHeaders(response),
        };
    }

    private finalUrlOf(response: AxiosResponse, fallback: string): string {
        // follow-redirects records the last hop on the underlying response
        const request: unknown = response.request;
        if (isRecord(request) && isRecord(request.res) && typeof request.res.responseUrl === 'string') {
            return request.res.responseUrl;
        }
        return fallback;
    }

    private flattenHeaders(response: AxiosResponse): Record<string, string> {
        const headers: Record<string, string> = {};
        for (const [name, value] of Object.entries<unknown>(response.headers)) {
            if (value === undefined || value === null) {
                continue;
            }
            headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
        }
        return headers;
    }

    private toFailure(url: string, error: unknown): Failure {
        if (isAxiosError(error)) {
            const message = this.describeTransportError(error.code, error.message);
            this.logger.error(`HTTP error for ${url}: ${message}`);
            return { ok: false, url, kind: FailureKind.TRANSPORT, error: `HTTP error: ${message}` };
        }

        this.logger.error(`Unexpected error for ${url}: ${error instanceof Error ? error.message : String(error)}`);
        return unexpectedFailure(url, error);
    }

    private describeTransportError(code: string | undefined, message: string): string {
        switch (code) {
            case 'ERR_CANCELED':
            case 'ECONNABORTED':
            case 'ETIMEDOUT':
                return `request timed out after ${this.timeoutMs} ms`;
            default:
                return message || code || 'request failed';
        }
    }
}
