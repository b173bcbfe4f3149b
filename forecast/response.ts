/**
 * Weather Forecast Client — Response Decoding
 *
 * Structural decoding of a response body into the typed model. Enum fields
 * go through the same wire codecs as requests. Unknown keys are dropped;
 * nothing beyond shape and token membership is checked. `toWireApiResponse`
 * goes the other way, for callers that store or replay bodies.
 */

import { z } from 'zod';
import { IconCodec, PrecipTypeCodec, SeverityCodec, UnitsCodec } from './codec';
import type { WireCodec } from './codec';
import { ResponseDecodeError } from './errors';
import type { Alert, ApiResponse, DataBlock, DataPoint, Flags } from './types';

function wireEnum<V extends string>(codec: WireCodec<V>) {
    return z.string().transform((token, ctx): V => {
        const variant = codec.tryDecode(token);
        if (variant === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Unrecognized ${codec.enumName} token: ${JSON.stringify(token)}`
            });
            return z.NEVER;
        }
        return variant;
    });
}

// null and missing both decode to an absent field
const optionalNumber = z.number().nullish().transform((v) => v ?? undefined);
const optionalEpoch = z.number().int().nullish().transform((v) => v ?? undefined);
const optionalString = z.string().nullish().transform((v) => v ?? undefined);
const optionalIcon = wireEnum(IconCodec).nullish().transform((v) => v ?? undefined);

function absentWhenNull<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    return schema.nullish().transform((v) => v ?? undefined);
}

// =============================================================================
// Schemas
// =============================================================================

export const dataPointSchema: z.ZodType<DataPoint, z.ZodTypeDef, unknown> = z.object({
    time: z.number().int(),
    apparentTemperature: optionalNumber,
    apparentTemperatureHigh: optionalNumber,
    apparentTemperatureHighTime: optionalEpoch,
    apparentTemperatureLow: optionalNumber,
    apparentTemperatureLowTime: optionalEpoch,
    apparentTemperatureMax: optionalNumber,
    apparentTemperatureMaxTime: optionalEpoch,
    apparentTemperatureMin: optionalNumber,
    apparentTemperatureMinTime: optionalEpoch,
    cloudCover: optionalNumber,
    dewPoint: optionalNumber,
    humidity: optionalNumber,
    icon: optionalIcon,
    moonPhase: optionalNumber,
    nearestStormBearing: optionalNumber,
    nearestStormDistance: optionalNumber,
    ozone: optionalNumber,
    precipAccumulation: optionalNumber,
    precipIntensity: optionalNumber,
    precipIntensityMax: optionalNumber,
    precipIntensityMaxTime: optionalEpoch,
    precipProbability: optionalNumber,
    precipType: wireEnum(PrecipTypeCodec).nullish().transform((v) => v ?? undefined),
    pressure: optionalNumber,
    summary: optionalString,
    sunriseTime: optionalEpoch,
    sunsetTime: optionalEpoch,
    temperature: optionalNumber,
    temperatureHigh: optionalNumber,
    temperatureHighTime: optionalEpoch,
    temperatureLow: optionalNumber,
    temperatureLowTime: optionalEpoch,
    temperatureMax: optionalNumber,
    temperatureMaxTime: optionalEpoch,
    temperatureMin: optionalNumber,
    temperatureMinTime: optionalEpoch,
    uvIndex: optionalNumber,
    uvIndexTime: optionalEpoch,
    visibility: optionalNumber,
    windBearing: optionalNumber,
    windGust: optionalNumber,
    windGustTime: optionalEpoch,
    windSpeed: optionalNumber
});

export const dataBlockSchema: z.ZodType<DataBlock, z.ZodTypeDef, unknown> = z.object({
    data: z.array(dataPointSchema),
    summary: optionalString,
    icon: optionalIcon
});

export const alertSchema: z.ZodType<Alert, z.ZodTypeDef, unknown> = z.object({
    description: z.string(),
    expires: z.number().int(),
    regions: z.array(z.string()),
    severity: wireEnum(SeverityCodec),
    time: z.number().int(),
    title: z.string(),
    uri: z.string()
});

export const flagsSchema: z.ZodType<Flags, z.ZodTypeDef, unknown> = z
    .object({
        'darksky-unavailable': optionalString,
        sources: z.array(z.string()),
        units: wireEnum(UnitsCodec)
    })
    .transform(({ 'darksky-unavailable': darkskyUnavailable, sources, units }): Flags => ({
        darkskyUnavailable,
        sources,
        units
    }));

export const apiResponseSchema: z.ZodType<ApiResponse, z.ZodTypeDef, unknown> = z.object({
    latitude: z.number(),
    longitude: z.number(),
    timezone: z.string(),
    offset: z.number(),
    currently: absentWhenNull(dataPointSchema),
    minutely: absentWhenNull(dataBlockSchema),
    hourly: absentWhenNull(dataBlockSchema),
    daily: absentWhenNull(dataBlockSchema),
    alerts: absentWhenNull(z.array(alertSchema)),
    flags: absentWhenNull(flagsSchema)
});

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decode an already-parsed JSON body. Throws ResponseDecodeError listing
 * every mismatch as `path: message`.
 */
export function parseApiResponse(json: unknown): ApiResponse {
    const parsed = apiResponseSchema.safeParse(json);
    if (!parsed.success) {
        throw new ResponseDecodeError(
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

/**
 * Read and decode the body of a fetch Response. The status is not
 * inspected; callers decide what a non-2xx body means.
 */
export async function readApiResponse(response: Response): Promise<ApiResponse> {
    const json: unknown = await response.json();
    return parseApiResponse(json);
}

// =============================================================================
// Encoding
// =============================================================================

export type WireDataPoint = Omit<DataPoint, 'icon' | 'precipType'> & { icon?: string; precipType?: string };

export type WireDataBlock = Omit<DataBlock, 'data' | 'icon'> & { data: WireDataPoint[]; icon?: string };

export type WireAlert = Omit<Alert, 'severity'> & { severity: string };

export interface WireFlags {
    'darksky-unavailable'?: string;
    sources: string[];
    units: string;
}

export type WireApiResponse = Omit<ApiResponse, 'currently' | 'minutely' | 'hourly' | 'daily' | 'alerts' | 'flags'> & {
    currently?: WireDataPoint;
    minutely?: WireDataBlock;
    hourly?: WireDataBlock;
    daily?: WireDataBlock;
    alerts?: WireAlert[];
    flags?: WireFlags;
};

export function toWireDataPoint(point: DataPoint): WireDataPoint {
    const { icon, precipType, ...rest } = point;
    return {
        ...rest,
        ...(icon === undefined ? {} : { icon: IconCodec.encode(icon) }),
        ...(precipType === undefined ? {} : { precipType: PrecipTypeCodec.encode(precipType) })
    };
}

export function toWireDataBlock(block: DataBlock): WireDataBlock {
    const { data, icon, ...rest } = block;
    return {
        ...rest,
        data: data.map(toWireDataPoint),
        ...(icon === undefined ? {} : { icon: IconCodec.encode(icon) })
    };
}

export function toWireAlert(alert: Alert): WireAlert {
    return { ...alert, regions: [...alert.regions], severity: SeverityCodec.encode(alert.severity) };
}

export function toWireFlags(flags: Flags): WireFlags {
    return {
        ...(flags.darkskyUnavailable === undefined ? {} : { 'darksky-unavailable': flags.darkskyUnavailable }),
        sources: [...flags.sources],
        units: UnitsCodec.encode(flags.units)
    };
}

/**
 * Inverse of `parseApiResponse`: enum fields back to wire tokens and
 * `darkskyUnavailable` back to `darksky-unavailable`. Absent fields are
 * left out rather than written as null.
 */
export function toWireApiResponse(response: ApiResponse): WireApiResponse {
    const { currently, minutely, hourly, daily, alerts, flags, ...rest } = response;
    return {
        ...rest,
        ...(currently === undefined ? {} : { currently: toWireDataPoint(currently) }),
        ...(minutely === undefined ? {} : { minutely: toWireDataBlock(minutely) }),
        ...(hourly === undefined ? {} : { hourly: toWireDataBlock(hourly) }),
        ...(daily === undefined ? {} : { daily: toWireDataBlock(daily) }),
        ...(alerts === undefined ? {} : { alerts: alerts.map(toWireAlert) }),
        ...(flags === undefined ? {} : { flags: toWireFlags(flags) })
    };
}
