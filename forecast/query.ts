/**
 * Weather Forecast Client — Query Encoder
 *
 * Parameters are emitted in the order given, absent values are dropped
 * entirely, and list values are comma-joined into a single parameter.
 * Commas stay literal in the output (`exclude=hourly,daily`).
 */

import type { WireCodec } from './codec';

export const EXCLUDE = 'exclude';
export const EXTEND = 'extend';
export const LANG = 'lang';
export const UNITS = 'units';

export interface QueryParam {
    name: string;
    /** Already-encoded wire value; undefined or '' means omit. */
    value: string | undefined;
}

export function enumParam<V extends string>(name: string, codec: WireCodec<V>, value: V | undefined): QueryParam {
    return { name, value: value === undefined ? undefined : codec.encode(value) };
}

/**
 * Join the encoded tokens with ','. An empty list yields no parameter.
 */
export function listParam<V extends string>(name: string, codec: WireCodec<V>, values: readonly V[]): QueryParam {
    if (values.length === 0) return { name, value: undefined };
    return { name, value: values.map((v) => codec.encode(v)).join(',') };
}

export function scalarParam(name: string, value: string | number | undefined): QueryParam {
    return { name, value: value === undefined ? undefined : String(value) };
}

/**
 * Percent-encode a query component. Comma is allowed through unescaped.
 */
export function encodeQueryComponent(raw: string): string {
    return encodeURIComponent(raw).replace(/%2C/gi, ',');
}

/**
 * Serialize params to `name=value&...` without a leading '?'.
 * Returns '' when nothing is present.
 */
export function encodeQuery(params: readonly QueryParam[]): string {
    const pairs: string[] = [];
    for (const { name, value } of params) {
        if (value === undefined || value === '') continue;
        pairs.push(`${encodeQueryComponent(name)}=${encodeQueryComponent(value)}`);
    }
    return pairs.join('&');
}
