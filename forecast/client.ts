/**
 * Weather Forecast Client — API Client
 *
 * A thin pass-through over a transport. The URL handed to the transport is
 * exactly the one the request computed at build time, and whatever the
 * transport resolves or rejects with reaches the caller untouched:
 * no retries, no status handling, no body parsing.
 */

import { isDebugLoggingEnabled } from './config';
import type { ApiRequest, ForecastRequest, HistoricalRequest } from './types';

// =============================================================================
// Transport
// =============================================================================

export interface TransportOptions {
    signal?: AbortSignal;
}

/** Anything that can GET a URL. */
export interface Transport<TResponse> {
    get(url: string, options?: TransportOptions): Promise<TResponse>;
}

/**
 * Default transport over the global fetch (Node 18+).
 */
export const fetchTransport: Transport<Response> = {
    get(url, options) {
        return fetch(url, { method: 'GET', signal: options?.signal });
    }
};

// =============================================================================
// Client
// =============================================================================

export class ApiClient<TResponse = Response> {
    private readonly transport: Transport<TResponse>;

    constructor(transport: Transport<TResponse>) {
        this.transport = transport;
    }

    /** Send a forecast request. */
    fetchForecast(request: ForecastRequest, options?: TransportOptions): Promise<TResponse> {
        return this.send(request, options);
    }

    /** Send a historical (time machine) request. */
    fetchHistorical(request: HistoricalRequest, options?: TransportOptions): Promise<TResponse> {
        return this.send(request, options);
    }

    private async send(request: ApiRequest, options: TransportOptions | undefined): Promise<TResponse> {
        if (isDebugLoggingEnabled()) {
            console.debug('[forecast] GET', { kind: request.kind, url: redactApiKey(request.url, request.apiKey) });
        }
        try {
            return await this.transport.get(request.url, options);
        } catch (error) {
            if (isAbortError(error)) {
                if (isDebugLoggingEnabled()) {
                    console.debug('[forecast] request aborted', {
                        kind: request.kind,
                        url: redactApiKey(request.url, request.apiKey)
                    });
                }
                throw error;
            }
            console.error('[forecast] transport failed', {
                kind: request.kind,
                url: redactApiKey(request.url, request.apiKey),
                error
            });
            throw error;
        }
    }
}

/**
 * Client over the global fetch.
 */
export function createFetchClient(): ApiClient<Response> {
    return new ApiClient(fetchTransport);
}

/** Caller cancellation through an AbortSignal, as fetch reports it. */
function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}

/**
 * Replace the API key path segment with `***` for logging.
 */
export function redactApiKey(url: string, apiKey: string): string {
    if (!apiKey) return url;
    return url.split(`/${encodeURIComponent(apiKey)}/`).join('/***/');
}
