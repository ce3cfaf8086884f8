import fs from 'fs/promises';
import path from 'path';
import _ from 'lodash';
import type { z } from 'zod';

import type { AuthHeaders } from './credentials.js';
import { ApiError, UnexpectedResponseError, describeError } from './errors.js';
import type { Logger } from './logger.js';

// --- Request description ---

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryScalar = string | number | boolean;
export type QueryValue = QueryScalar | readonly QueryScalar[] | null | undefined;
export type Query = Record<string, QueryValue>;

export interface ApiRequest {
    method: HttpMethod;
    /** Path below the base URL, e.g. `/project/full`. */
    path: string;
    /** Prefix of the error message, e.g. "Failed to get patient". */
    action: string;
    query?: Query;
    json?: unknown;
    form?: FormData;
}

export interface HttpTransportOptions {
    baseUrl: string;
    headers: AuthHeaders;
    timeoutMs: number;
    logger: Logger;
}

/**
 * Unset query entries are dropped; lists become repeated keys.
 */
export function buildQueryString(query: Query = {}): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
        if (_.isNil(value)) continue;
        const values: readonly QueryScalar[] = typeof value === 'object' ? value : [value];
        for (const item of values) params.append(key, String(item));
    }
    const qs = params.toString();
    return qs ? `?${qs}` : '';
}

// --- Transport ---

export class HttpTransport {
    private readonly baseUrl: string;

    constructor(private readonly opts: HttpTransportOptions) {
        this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    }

    url(requestPath: string, query?: Query): string {
        return `${this.baseUrl}${requestPath}${buildQueryString(query)}`;
    }

    /** Resolves a path the server handed back, which may be relative to the base URL. */
    resolve(urlOrPath: string): string {
        return urlOrPath.startsWith('/') ? `${this.baseUrl}${urlOrPath}` : urlOrPath;
    }

    /** Issues the request and parses the 2xx body as JSON validated by `schema`. */
    async json<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: ApiRequest): Promise<T> {
        const response = await this.send(req);
        const text = await this.readText(req, response);
        return this.parse(schema, req, text);
    }

    /** Like `json`, but an empty 2xx body (e.g. 204 on delete) resolves to `null`. */
    async optionalJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: ApiRequest): Promise<T | null> {
        const response = await this.send(req);
        const text = await this.readText(req, response);
        if (text.trim() === '') return null;
        return this.parse(schema, req, text);
    }

    private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: ApiRequest, text: string): T {
        let data: unknown;
        try {
            data = JSON.parse(text);
        } catch {
            throw new UnexpectedResponseError(`${req.action}: response is not JSON`, text);
        }
        const parsed = schema.safeParse(data);
        if (!parsed.success) {
            const issues = parsed.error.errors.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
            throw new UnexpectedResponseError(`${req.action}: unexpected response shape (${issues})`, text);
        }
        return parsed.data;
    }

    /** Issues the request and discards whatever body comes back. */
    async empty(req: ApiRequest): Promise<void> {
        const response = await this.send(req);
        await this.readText(req, response);
    }

    /** Writes the 2xx body text to `outputFile`, creating parent directories. */
    async download(req: ApiRequest, outputFile: string): Promise<void> {
        const response = await this.send(req);
        const text = await this.readText(req, response);
        await fs.mkdir(path.dirname(outputFile), { recursive: true });
        await fs.writeFile(outputFile, text, 'utf-8');
    }

    /** Sends raw bytes to an absolute (pre-signed) URL without the auth headers. */
    async putBytes(url: string, bytes: Uint8Array, action: string): Promise<void> {
        const response = await this.execute('PUT', url, { body: bytes }, action);
        await this.readText({ method: 'PUT', path: url, action }, response);
    }

    /** Fetches an absolute URL without the auth headers and writes the bytes to `outputFile`. */
    async fetchToFile(url: string, outputFile: string, action: string): Promise<void> {
        const response = await this.execute('GET', url, {}, action);
        let bytes: ArrayBuffer;
        try {
            bytes = await response.arrayBuffer();
        } catch (error) {
            throw new ApiError(action, { method: 'GET', url, status: null, body: describeError(error) });
        }
        await fs.mkdir(path.dirname(outputFile), { recursive: true });
        await fs.writeFile(outputFile, new Uint8Array(bytes));
    }

    async send(req: ApiRequest): Promise<Response> {
        const url = this.url(req.path, req.query);
        const headers: Record<string, string> = { Accept: 'application/json', ...this.opts.headers };
        let body: string | FormData | undefined;
        if (req.form) {
            body = req.form; // fetch sets the multipart boundary itself
        } else if (req.json !== undefined) {
            headers['Content-Type'] = 'application/json';
            body = JSON.stringify(req.json);
        }
        return this.execute(req.method, url, { headers, body }, req.action);
    }

    private async execute(
        method: HttpMethod,
        url: string,
        init: { headers?: Record<string, string>; body?: string | FormData | Uint8Array },
        action: string
    ): Promise<Response> {
        this.opts.logger.debug({ method, url }, 'HTTP request');
        let response: Response;
        try {
            response = await fetch(url, {
                method,
                headers: init.headers,
                body: init.body,
                signal: AbortSignal.timeout(this.opts.timeoutMs),
            });
        } catch (error) {
            const reason = describeError(error);
            this.opts.logger.error({ method, url, reason }, action);
            throw new ApiError(action, { method, url, status: null, body: reason });
        }

        if (response.status < 200 || response.status >= 300) {
            const text = await this.readText({ method, path: url, action }, response);
            this.opts.logger.error({ method, url, status: response.status, body: text }, action);
            throw new ApiError(action, { method, url, status: response.status, body: text });
        }
        return response;
    }

    private async readText(req: ApiRequest, response: Response): Promise<string> {
        try {
            return await response.text();
        } catch (error) {
            throw new ApiError(req.action, {
                method: req.method,
                url: response.url || req.path,
                status: null,
                body: describeError(error),
            });
        }
    }
}
