/**
 * Weather Forecast Client — Wire Enum Codec
 *
 * Explicit variant <-> token tables for every enumeration the API speaks.
 * Tokens are bare strings (`ar`, not `"ar"`); nothing here knows about
 * URLs or JSON.
 *
 * Every table is a bijection. The one exception is Lang, where `no` is an
 * input-only alias of NorwegianBokmal: it decodes, but encoding always
 * yields `nb`.
 */

import { UnrecognizedTokenError } from './errors';
import { ExcludeBlock, ExtendBy, Icon, Lang, PrecipType, Severity, Units } from './types';

export class WireCodec<V extends string> {
    readonly enumName: string;
    private readonly toToken: Readonly<Record<V, string>>;
    private readonly fromToken: ReadonlyMap<string, V>;
    private readonly canonicalTokens: readonly string[];

    /**
     * @param table variant -> emitted token
     * @param aliases extra accepted input tokens -> variant
     */
    constructor(enumName: string, table: Record<V, string>, aliases: Readonly<Record<string, V>> = {}) {
        this.enumName = enumName;
        this.toToken = Object.freeze({ ...table });

        const fromToken = new Map<string, V>();
        const entries: [V, string][] = [];
        for (const key of Object.keys(table)) {
            if (isVariantOf(table, key)) entries.push([key, table[key]]);
        }
        for (const [variant, token] of entries) {
            const existing = fromToken.get(token);
            if (existing !== undefined) {
                throw new Error(`${enumName}: token '${token}' maps to both ${existing} and ${variant}`);
            }
            fromToken.set(token, variant);
        }
        this.canonicalTokens = Object.freeze(entries.map(([, token]) => token));

        for (const [alias, variant] of Object.entries(aliases)) {
            if (fromToken.has(alias)) {
                throw new Error(`${enumName}: alias '${alias}' collides with an existing token`);
            }
            fromToken.set(alias, variant);
        }
        this.fromToken = fromToken;
    }

    encode(variant: V): string {
        return this.toToken[variant];
    }

    /** Returns undefined for an unknown token. */
    tryDecode(token: string): V | undefined {
        return this.fromToken.get(token);
    }

    decode(token: string): V {
        const variant = this.tryDecode(token);
        if (variant === undefined) {
            throw new UnrecognizedTokenError(this.enumName, token);
        }
        return variant;
    }

    /** Tokens emitted by `encode`, in table order. Aliases are not included. */
    tokens(): readonly string[] {
        return this.canonicalTokens;
    }

    variants(): V[] {
        return Array.from(new Set(this.fromToken.values()));
    }
}

function isVariantOf<V extends string>(table: Record<V, string>, key: string): key is V {
    return Object.prototype.hasOwnProperty.call(table, key);
}

// =============================================================================
// Request Codecs
// =============================================================================

export const ExcludeBlockCodec = new WireCodec<ExcludeBlock>('ExcludeBlock', {
    [ExcludeBlock.Currently]: 'currently',
    [ExcludeBlock.Minutely]: 'minutely',
    [ExcludeBlock.Hourly]: 'hourly',
    [ExcludeBlock.Daily]: 'daily',
    [ExcludeBlock.Alerts]: 'alerts',
    [ExcludeBlock.Flags]: 'flags'
});

export const ExtendByCodec = new WireCodec<ExtendBy>('ExtendBy', {
    [ExtendBy.Hourly]: 'hourly'
});

export const LangCodec = new WireCodec<Lang>(
    'Lang',
    {
        [Lang.Arabic]: 'ar',
        [Lang.Azerbaijani]: 'az',
        [Lang.Belarusian]: 'be',
        [Lang.Bulgarian]: 'bg',
        [Lang.Bosnian]: 'bs',
        [Lang.Catalan]: 'ca',
        [Lang.Czech]: 'cz',
        [Lang.Danish]: 'da',
        [Lang.German]: 'de',
        [Lang.Greek]: 'el',
        [Lang.English]: 'en',
        [Lang.Spanish]: 'es',
        [Lang.Estonian]: 'et',
        [Lang.Finnish]: 'fi',
        [Lang.French]: 'fr',
        [Lang.Croatian]: 'hr',
        [Lang.Hungarian]: 'hu',
        [Lang.Indonesian]: 'id',
        [Lang.Icelandic]: 'is',
        [Lang.Italian]: 'it',
        [Lang.Japanese]: 'ja',
        [Lang.Georgian]: 'ka',
        [Lang.Korean]: 'ko',
        [Lang.Cornish]: 'kw',
        [Lang.NorwegianBokmal]: 'nb',
        [Lang.Dutch]: 'nl',
        [Lang.Polish]: 'pl',
        [Lang.Portuguese]: 'pt',
        [Lang.Romanian]: 'ro',
        [Lang.Russian]: 'ru',
        [Lang.Slovak]: 'sk',
        [Lang.Slovenian]: 'sl',
        [Lang.Serbian]: 'sr',
        [Lang.Swedish]: 'sv',
        [Lang.Tetum]: 'tet',
        [Lang.Turkish]: 'tr',
        [Lang.Ukrainian]: 'uk',
        [Lang.IgpayAtinlay]: 'x-pig-latin',
        [Lang.SimplifiedChinese]: 'zh',
        [Lang.TraditionalChinese]: 'zh-tw'
    },
    // Legacy code for Norwegian; accepted on input, never emitted.
    { no: Lang.NorwegianBokmal }
);

export const UnitsCodec = new WireCodec<Units>('Units', {
    [Units.Auto]: 'auto',
    [Units.CA]: 'ca',
    [Units.UK]: 'uk2',
    [Units.Imperial]: 'us',
    [Units.SI]: 'si'
});

// =============================================================================
// Response Codecs
// =============================================================================

export const SeverityCodec = new WireCodec<Severity>('Severity', {
    [Severity.Advisory]: 'advisory',
    [Severity.Watch]: 'watch',
    [Severity.Warning]: 'warning'
});

export const IconCodec = new WireCodec<Icon>('Icon', {
    [Icon.ClearDay]: 'clear-day',
    [Icon.ClearNight]: 'clear-night',
    [Icon.Rain]: 'rain',
    [Icon.Snow]: 'snow',
    [Icon.Sleet]: 'sleet',
    [Icon.Wind]: 'wind',
    [Icon.Fog]: 'fog',
    [Icon.Cloudy]: 'cloudy',
    [Icon.PartlyCloudyDay]: 'partly-cloudy-day',
    [Icon.PartlyCloudyNight]: 'partly-cloudy-night',
    [Icon.Hail]: 'hail',
    [Icon.Thunderstorm]: 'thunderstorm',
    [Icon.Tornado]: 'tornado'
});

export const PrecipTypeCodec = new WireCodec<PrecipType>('PrecipType', {
    [PrecipType.Rain]: 'rain',
    [PrecipType.Snow]: 'snow',
    [PrecipType.Sleet]: 'sleet'
});
