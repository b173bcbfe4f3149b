/**
 * Weather Forecast Client — Core Type Definitions
 *
 * Enumerations are closed and wire-stable. Each is an `as const` object of
 * variant names plus a union type of the same name; the wire tokens live in
 * the codec tables (see codec.ts), never in the variant names.
 */

// =============================================================================
// Request Enumerations
// =============================================================================

/** Response sections the caller wants omitted. */
export const ExcludeBlock = {
    Currently: 'Currently',
    Minutely: 'Minutely',
    Hourly: 'Hourly',
    Daily: 'Daily',
    Alerts: 'Alerts',
    Flags: 'Flags'
} as const;
export type ExcludeBlock = (typeof ExcludeBlock)[keyof typeof ExcludeBlock];

/**
 * Extends the hourly block from 48 to 168 hours.
 * Single-valued today.
 */
export const ExtendBy = {
    Hourly: 'Hourly'
} as const;
export type ExtendBy = (typeof ExtendBy)[keyof typeof ExtendBy];

/** Language of the summaries in the response. */
export const Lang = {
    Arabic: 'Arabic',
    Azerbaijani: 'Azerbaijani',
    Belarusian: 'Belarusian',
    Bulgarian: 'Bulgarian',
    Bosnian: 'Bosnian',
    Catalan: 'Catalan',
    Czech: 'Czech',
    Danish: 'Danish',
    German: 'German',
    Greek: 'Greek',
    English: 'English',
    Spanish: 'Spanish',
    Estonian: 'Estonian',
    Finnish: 'Finnish',
    French: 'French',
    Croatian: 'Croatian',
    Hungarian: 'Hungarian',
    Indonesian: 'Indonesian',
    Icelandic: 'Icelandic',
    Italian: 'Italian',
    Japanese: 'Japanese',
    Georgian: 'Georgian',
    Korean: 'Korean',
    Cornish: 'Cornish',
    NorwegianBokmal: 'NorwegianBokmal',
    Dutch: 'Dutch',
    Polish: 'Polish',
    Portuguese: 'Portuguese',
    Romanian: 'Romanian',
    Russian: 'Russian',
    Slovak: 'Slovak',
    Slovenian: 'Slovenian',
    Serbian: 'Serbian',
    Swedish: 'Swedish',
    Tetum: 'Tetum',
    Turkish: 'Turkish',
    Ukrainian: 'Ukrainian',
    IgpayAtinlay: 'IgpayAtinlay',
    SimplifiedChinese: 'SimplifiedChinese',
    TraditionalChinese: 'TraditionalChinese'
} as const;
export type Lang = (typeof Lang)[keyof typeof Lang];

/** Measurement units of the response data. */
export const Units = {
    Auto: 'Auto',
    CA: 'CA',
    UK: 'UK',
    Imperial: 'Imperial',
    SI: 'SI'
} as const;
export type Units = (typeof Units)[keyof typeof Units];

// =============================================================================
// Response Enumerations
// =============================================================================

export const Severity = {
    Advisory: 'Advisory',
    Watch: 'Watch',
    Warning: 'Warning'
} as const;
export type Severity = (typeof Severity)[keyof typeof Severity];

export const Icon = {
    ClearDay: 'ClearDay',
    ClearNight: 'ClearNight',
    Rain: 'Rain',
    Snow: 'Snow',
    Sleet: 'Sleet',
    Wind: 'Wind',
    Fog: 'Fog',
    Cloudy: 'Cloudy',
    PartlyCloudyDay: 'PartlyCloudyDay',
    PartlyCloudyNight: 'PartlyCloudyNight',
    Hail: 'Hail',
    Thunderstorm: 'Thunderstorm',
    Tornado: 'Tornado'
} as const;
export type Icon = (typeof Icon)[keyof typeof Icon];

export const PrecipType = {
    Rain: 'Rain',
    Snow: 'Snow',
    Sleet: 'Sleet'
} as const;
export type PrecipType = (typeof PrecipType)[keyof typeof PrecipType];

// =============================================================================
// Requests
// =============================================================================

export type RequestKind = 'forecast' | 'historical';

interface RequestBase {
    kind: RequestKind;
    apiKey: string;
    latitude: number;
    longitude: number;

    /** Blocks to omit, in insertion order. Duplicates are passed through. */
    exclude: readonly ExcludeBlock[];

    lang?: Lang;
    units?: Units;

    /** Finished URL, computed once at build time. */
    url: string;
}

/**
 * A finalized request to the forecast endpoint.
 * Frozen: no field changes after `build()`.
 */
export interface ForecastRequest extends Readonly<RequestBase> {
    readonly kind: 'forecast';
    readonly extend?: ExtendBy;
}

/**
 * A finalized request to the historical (time machine) endpoint.
 */
export interface HistoricalRequest extends Readonly<RequestBase> {
    readonly kind: 'historical';

    /** Unix epoch seconds of the requested point in time */
    readonly time: number;
}

export type ApiRequest = ForecastRequest | HistoricalRequest;

export interface BuilderOptions {
    /** Endpoint base, without trailing slash. Defaults to the configured base URL. */
    baseUrl?: string;
}

// =============================================================================
// Response Model
// =============================================================================

/**
 * Conditions at a point in time, or averaged over a period.
 * Every field but `time` may be absent.
 */
export interface DataPoint {
    time: number;
    apparentTemperature?: number;
    apparentTemperatureHigh?: number;
    apparentTemperatureHighTime?: number;
    apparentTemperatureLow?: number;
    apparentTemperatureLowTime?: number;
    /** @deprecated use apparentTemperatureHigh */
    apparentTemperatureMax?: number;
    /** @deprecated use apparentTemperatureHighTime */
    apparentTemperatureMaxTime?: number;
    /** @deprecated use apparentTemperatureLow */
    apparentTemperatureMin?: number;
    /** @deprecated use apparentTemperatureLowTime */
    apparentTemperatureMinTime?: number;
    cloudCover?: number;
    dewPoint?: number;
    humidity?: number;
    icon?: Icon;
    moonPhase?: number;
    nearestStormBearing?: number;
    nearestStormDistance?: number;
    ozone?: number;
    precipAccumulation?: number;
    precipIntensity?: number;
    precipIntensityMax?: number;
    precipIntensityMaxTime?: number;
    precipProbability?: number;
    precipType?: PrecipType;
    pressure?: number;
    summary?: string;
    sunriseTime?: number;
    sunsetTime?: number;
    temperature?: number;
    temperatureHigh?: number;
    temperatureHighTime?: number;
    temperatureLow?: number;
    temperatureLowTime?: number;
    /** @deprecated use temperatureHigh */
    temperatureMax?: number;
    /** @deprecated use temperatureHighTime */
    temperatureMaxTime?: number;
    /** @deprecated use temperatureLow */
    temperatureMin?: number;
    /** @deprecated use temperatureLowTime */
    temperatureMinTime?: number;
    uvIndex?: number;
    uvIndexTime?: number;
    visibility?: number;
    windBearing?: number;
    windGust?: number;
    windGustTime?: number;
    windSpeed?: number;
}

export interface DataBlock {
    data: DataPoint[];
    summary?: string;
    icon?: Icon;
}

/** A severe weather warning issued for the requested location. */
export interface Alert {
    description: string;
    expires: number;
    regions: string[];
    severity: Severity;
    time: number;
    title: string;
    uri: string;
}

export interface Flags {
    /** Wire key: `darksky-unavailable` */
    darkskyUnavailable?: string;
    sources: string[];
    units: Units;
}

export interface ApiResponse {
    latitude: number;
    longitude: number;
    timezone: string;
    /** @deprecated derive the offset from `timezone` */
    offset: number;
    currently?: DataPoint;
    minutely?: DataBlock;
    hourly?: DataBlock;
    daily?: DataBlock;
    alerts?: Alert[];
    flags?: Flags;
}
