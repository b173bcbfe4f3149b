/**
 * Weather Forecast Client — Request Builders
 *
 * Builders accumulate optional parameters through chained calls and are
 * finalized exactly once by `build()`, which computes the URL eagerly and
 * returns a frozen request. A built builder rejects every further call.
 *
 * URL layout:
 *   {base}/{apiKey}/{latitude},{longitude}          (forecast)
 *   {base}/{apiKey}/{latitude},{longitude},{time}   (historical)
 * followed by `?{query}` only when at least one parameter is present.
 */

import { ExcludeBlockCodec, ExtendByCodec, LangCodec, UnitsCodec } from './codec';
import { getForecastBaseUrl } from './config';
import { BuilderConsumedError, MalformedUrlError } from './errors';
import { EXCLUDE, EXTEND, LANG, UNITS, encodeQuery, enumParam, listParam } from './query';
import type { QueryParam } from './query';
import type {
    ApiRequest,
    BuilderOptions,
    ExcludeBlock,
    ExtendBy,
    ForecastRequest,
    HistoricalRequest,
    Lang,
    Units
} from './types';

/** Digits after the decimal point for latitude and longitude. */
export const COORDINATE_DECIMALS = 16;

/** From here on `toFixed` switches to exponential notation. */
const MAX_FIXED_MAGNITUDE = 1e21;

/**
 * Render a coordinate as fixed-point with exactly 16 decimals.
 *
 * `toFixed` rounds the exact binary value, so 6.66 becomes
 * 6.6600000000000001 and 66.6 becomes 66.5999999999999943. Negative zero
 * keeps its sign: -0 becomes -0.0000000000000000.
 */
export function formatCoordinate(value: number): string {
    const fixed = value.toFixed(COORDINATE_DECIMALS);
    return Object.is(value, -0) ? `-${fixed}` : fixed;
}

// =============================================================================
// Shared Builder
// =============================================================================

abstract class RequestBuilder<R extends ApiRequest> {
    protected readonly apiKey: string;
    protected readonly latitude: number;
    protected readonly longitude: number;
    protected readonly baseUrl: string;

    protected readonly exclude: ExcludeBlock[] = [];
    protected lang: Lang | undefined;
    protected units: Units | undefined;

    private consumed = false;

    protected constructor(apiKey: string, latitude: number, longitude: number, options: BuilderOptions) {
        this.apiKey = apiKey;
        this.latitude = latitude;
        this.longitude = longitude;
        this.baseUrl = (options.baseUrl ?? getForecastBaseUrl()).replace(/\/+$/, '');
    }

    protected abstract readonly builderName: string;

    /** Components appended to the path after latitude and longitude. */
    protected abstract extraLocationComponents(): string[];

    /** Query params in wire order. */
    protected abstract queryParams(): QueryParam[];

    protected abstract finalize(url: string): R;

    /** Add a block to exclude from the response. Duplicates are kept. */
    addExclude(block: ExcludeBlock): this {
        this.assertOpen();
        this.exclude.push(block);
        return this;
    }

    /**
     * Add several blocks to exclude. The source array is drained.
     */
    addExcludes(blocks: ExcludeBlock[]): this {
        this.assertOpen();
        this.exclude.push(...blocks.splice(0, blocks.length));
        return this;
    }

    setLang(lang: Lang): this {
        this.assertOpen();
        this.lang = lang;
        return this;
    }

    setUnits(units: Units): this {
        this.assertOpen();
        this.units = units;
        return this;
    }

    /**
     * Finalize the request. Throws MalformedUrlError if the URL cannot be
     * formed; the builder stays unconsumed in that case.
     */
    build(): R {
        this.assertOpen();
        const url = this.buildUrl();
        this.consumed = true;
        return this.finalize(url);
    }

    private buildUrl(): string {
        const location = [
            this.coordinate('latitude', this.latitude),
            this.coordinate('longitude', this.longitude),
            ...this.extraLocationComponents()
        ].join(',');
        if (this.apiKey === '.' || this.apiKey === '..') {
            throw new MalformedUrlError(`${this.builderName}: API key must not be a dot segment`, this.baseUrl);
        }
        const path = `${this.baseUrl}/${encodeURIComponent(this.apiKey)}/${location}`;

        let parsed: URL;
        try {
            parsed = new URL(path);
        } catch (error) {
            throw new MalformedUrlError(`${this.builderName}: invalid base URL '${this.baseUrl}'`, path, error);
        }
        if (parsed.search !== '' || parsed.hash !== '') {
            throw new MalformedUrlError(`${this.builderName}: base URL must not carry a query or fragment`, path);
        }

        const query = encodeQuery(this.queryParams());
        return query ? `${parsed.href}?${query}` : parsed.href;
    }

    private coordinate(label: string, value: number): string {
        if (!Number.isFinite(value)) {
            throw new MalformedUrlError(`${this.builderName}: ${label} must be a finite number, got ${value}`, this.baseUrl);
        }
        if (Math.abs(value) >= MAX_FIXED_MAGNITUDE) {
            throw new MalformedUrlError(`${this.builderName}: ${label} is out of fixed-point range, got ${value}`, this.baseUrl);
        }
        return formatCoordinate(value);
    }

    protected assertOpen(): void {
        if (this.consumed) throw new BuilderConsumedError(this.builderName);
    }
}

// =============================================================================
// Forecast
// =============================================================================

export class ForecastRequestBuilder extends RequestBuilder<ForecastRequest> {
    protected readonly builderName = 'ForecastRequestBuilder';
    private extend: ExtendBy | undefined;

    constructor(apiKey: string, latitude: number, longitude: number, options: BuilderOptions = {}) {
        super(apiKey, latitude, longitude, options);
    }

    /** Extend the hourly block from 48 to 168 hours. */
    setExtend(extend: ExtendBy): this {
        this.assertOpen();
        this.extend = extend;
        return this;
    }

    protected extraLocationComponents(): string[] {
        return [];
    }

    protected queryParams(): QueryParam[] {
        return [
            listParam(EXCLUDE, ExcludeBlockCodec, this.exclude),
            enumParam(EXTEND, ExtendByCodec, this.extend),
            enumParam(LANG, LangCodec, this.lang),
            enumParam(UNITS, UnitsCodec, this.units)
        ];
    }

    protected finalize(url: string): ForecastRequest {
        return Object.freeze({
            kind: 'forecast',
            apiKey: this.apiKey,
            latitude: this.latitude,
            longitude: this.longitude,
            exclude: Object.freeze([...this.exclude]),
            extend: this.extend,
            lang: this.lang,
            units: this.units,
            url
        });
    }
}

// =============================================================================
// Historical (Time Machine)
// =============================================================================

export class HistoricalRequestBuilder extends RequestBuilder<HistoricalRequest> {
    protected readonly builderName = 'HistoricalRequestBuilder';
    private readonly time: number;

    /**
     * @param time Unix epoch seconds
     */
    constructor(apiKey: string, latitude: number, longitude: number, time: number, options: BuilderOptions = {}) {
        super(apiKey, latitude, longitude, options);
        this.time = time;
    }

    protected extraLocationComponents(): string[] {
        if (!Number.isSafeInteger(this.time) || this.time < 0) {
            throw new MalformedUrlError(
                `${this.builderName}: time must be a non-negative integer epoch, got ${this.time}`,
                this.baseUrl
            );
        }
        return [String(this.time)];
    }

    protected queryParams(): QueryParam[] {
        return [
            listParam(EXCLUDE, ExcludeBlockCodec, this.exclude),
            enumParam(LANG, LangCodec, this.lang),
            enumParam(UNITS, UnitsCodec, this.units)
        ];
    }

    protected finalize(url: string): HistoricalRequest {
        return Object.freeze({
            kind: 'historical',
            apiKey: this.apiKey,
            latitude: this.latitude,
            longitude: this.longitude,
            time: this.time,
            exclude: Object.freeze([...this.exclude]),
            lang: this.lang,
            units: this.units,
            url
        });
    }
}
