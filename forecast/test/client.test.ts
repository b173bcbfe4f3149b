import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ApiClient, createFetchClient, redactApiKey, type Transport, type TransportOptions } from '../client';
import { ForecastRequestBuilder, HistoricalRequestBuilder } from '../request';
import { ExcludeBlock, ExtendBy, Lang, Units } from '../types';

const API_KEY = 'test-secret';

type FakeResponse = { status: number; body: string };

class RecordingTransport implements Transport<FakeResponse> {
    calls: { url: string; options?: TransportOptions }[] = [];
    private readonly next: () => Promise<FakeResponse>;

    constructor(next: () => Promise<FakeResponse>) {
        this.next = next;
    }

    async get(url: string, options?: TransportOptions): Promise<FakeResponse> {
        this.calls.push({ url, options });
        return this.next();
    }
}

describe('ApiClient', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        vi.unstubAllEnvs();
        vi.unstubAllGlobals();
    });

    it('hands the prebuilt forecast URL to the transport and returns its result as-is', async () => {
        const response: FakeResponse = { status: 503, body: 'upstream down' };
        const transport = new RecordingTransport(async () => response);
        const client = new ApiClient(transport);

        const request = new ForecastRequestBuilder(API_KEY, 6.66, 66.6)
            .addExclude(ExcludeBlock.Hourly)
            .setExtend(ExtendBy.Hourly)
            .setUnits(Units.Imperial)
            .build();

        const result = await client.fetchForecast(request);

        expect(result).toBe(response);
        expect(transport.calls).toHaveLength(1);
        expect(transport.calls[0].url).toBe(request.url);
    });

    it('sends historical requests the same way', async () => {
        const transport = new RecordingTransport(async () => ({ status: 200, body: '{}' }));
        const client = new ApiClient(transport);
        const request = new HistoricalRequestBuilder(API_KEY, 6.66, 66.6, 666).setLang(Lang.Arabic).build();

        await client.fetchHistorical(request);

        expect(transport.calls[0].url).toBe(
            'https://api.pirateweather.net/forecast/test-secret/6.6600000000000001,66.5999999999999943,666?lang=ar'
        );
    });

    it('propagates transport errors verbatim', async () => {
        const failure = new TypeError('fetch failed');
        const transport = new RecordingTransport(() => Promise.reject(failure));
        const client = new ApiClient(transport);
        const request = new ForecastRequestBuilder(API_KEY, 1, 2).build();

        await expect(client.fetchForecast(request)).rejects.toBe(failure);
        expect(transport.calls).toHaveLength(1);
        expect(console.error).toHaveBeenCalledWith('[forecast] transport failed', {
            kind: 'forecast',
            url: 'https://api.pirateweather.net/forecast/***/1.0000000000000000,2.0000000000000000',
            error: failure
        });
    });

    it('rethrows aborts without logging them as failures', async () => {
        const abort = Object.assign(new Error('The operation was aborted.'), { name: 'AbortError' });
        const transport = new RecordingTransport(() => Promise.reject(abort));
        const client = new ApiClient(transport);
        const request = new ForecastRequestBuilder(API_KEY, 1, 2).build();

        await expect(client.fetchForecast(request)).rejects.toBe(abort);
        expect(console.error).not.toHaveBeenCalled();
        expect(console.debug).not.toHaveBeenCalled();

        vi.stubEnv('FORECAST_DEBUG', '1');
        await expect(client.fetchForecast(request)).rejects.toBe(abort);
        expect(console.error).not.toHaveBeenCalled();
        expect(console.debug).toHaveBeenCalledWith('[forecast] request aborted', {
            kind: 'forecast',
            url: 'https://api.pirateweather.net/forecast/***/1.0000000000000000,2.0000000000000000'
        });
    });

    it('forwards the abort signal', async () => {
        const transport = new RecordingTransport(async () => ({ status: 200, body: '' }));
        const client = new ApiClient(transport);
        const controller = new AbortController();
        const request = new ForecastRequestBuilder(API_KEY, 1, 2).build();

        await client.fetchForecast(request, { signal: controller.signal });

        expect(transport.calls[0].options?.signal).toBe(controller.signal);
    });

    it('handles concurrent calls independently', async () => {
        const transport = new RecordingTransport(async () => ({ status: 200, body: '' }));
        const client = new ApiClient(transport);
        const a = new ForecastRequestBuilder(API_KEY, 1, 2).build();
        const b = new HistoricalRequestBuilder(API_KEY, 3, 4, 5).build();

        await Promise.all([client.fetchForecast(a), client.fetchHistorical(b)]);

        expect(transport.calls.map((c) => c.url)).toEqual([a.url, b.url]);
    });

    it('logs requests only when debug logging is enabled', async () => {
        const transport = new RecordingTransport(async () => ({ status: 200, body: '' }));
        const client = new ApiClient(transport);
        const request = new ForecastRequestBuilder(API_KEY, 1, 2).build();

        await client.fetchForecast(request);
        expect(console.debug).not.toHaveBeenCalled();

        vi.stubEnv('FORECAST_DEBUG', 'true');
        await client.fetchForecast(request);
        expect(console.debug).toHaveBeenCalledWith('[forecast] GET', {
            kind: 'forecast',
            url: 'https://api.pirateweather.net/forecast/***/1.0000000000000000,2.0000000000000000'
        });
    });

    it('default client issues a GET through global fetch', async () => {
        const fetchResponse = new Response('{}', { status: 200 });
        const mockFetch = vi.fn().mockResolvedValue(fetchResponse);
        vi.stubGlobal('fetch', mockFetch);

        const request = new ForecastRequestBuilder(API_KEY, 1, 2).build();
        const result = await createFetchClient().fetchForecast(request);

        expect(result).toBe(fetchResponse);
        expect(mockFetch).toHaveBeenCalledWith(request.url, { method: 'GET', signal: undefined });
    });
});

describe('redactApiKey', () => {
    it('masks the key path segment', () => {
        expect(redactApiKey('https://h.test/forecast/abc/1,2?lang=ar', 'abc')).toBe('https://h.test/forecast/***/1,2?lang=ar');
    });

    it('leaves URLs without the key untouched', () => {
        expect(redactApiKey('https://h.test/forecast/abc/1,2', 'xyz')).toBe('https://h.test/forecast/abc/1,2');
    });
});
