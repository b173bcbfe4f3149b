import { describe, it, expect } from 'vitest';
import { ExcludeBlockCodec, LangCodec, UnitsCodec } from '../codec';
import { encodeQuery, encodeQueryComponent, enumParam, listParam, scalarParam } from '../query';
import { ExcludeBlock, Lang, Units } from '../types';

describe('Query Encoder', () => {

    it('keeps caller order and drops absent values', () => {
        const query = encodeQuery([
            enumParam('units', UnitsCodec, Units.SI),
            enumParam('lang', LangCodec, undefined),
            scalarParam('time', 666)
        ]);
        expect(query).toBe('units=si&time=666');
    });

    it('joins list values with literal commas, duplicates included', () => {
        const query = encodeQuery([
            listParam('exclude', ExcludeBlockCodec, [
                ExcludeBlock.Hourly,
                ExcludeBlock.Daily,
                ExcludeBlock.Hourly
            ])
        ]);
        expect(query).toBe('exclude=hourly,daily,hourly');
    });

    it('omits an empty list entirely', () => {
        expect(listParam('exclude', ExcludeBlockCodec, []).value).toBeUndefined();
        expect(encodeQuery([listParam('exclude', ExcludeBlockCodec, [])])).toBe('');
    });

    it('omits empty strings', () => {
        expect(encodeQuery([scalarParam('a', ''), scalarParam('b', 'x')])).toBe('b=x');
    });

    it('percent-encodes reserved characters except comma', () => {
        expect(encodeQueryComponent('a b&c=d,e')).toBe('a%20b%26c%3Dd,e');
        expect(encodeQuery([scalarParam('q', 'x/y?z')])).toBe('q=x%2Fy%3Fz');
    });

    it('passes hyphenated tokens through unchanged', () => {
        expect(encodeQuery([enumParam('lang', LangCodec, Lang.IgpayAtinlay)])).toBe('lang=x-pig-latin');
    });
});
