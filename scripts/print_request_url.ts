import { getApiKey } from '../forecast/config';
import { ForecastRequestBuilder, HistoricalRequestBuilder } from '../forecast/request';
import { ExcludeBlock, Lang, Units } from '../forecast/types';

// Roxville, NS
const lat = 44.60746;
const lon = -65.86646;
// Start of the previous UTC day
const time = Math.floor(Date.now() / 86_400_000) * 86_400 - 86_400;

const apiKey = getApiKey();

const forecast = new ForecastRequestBuilder(apiKey, lat, lon)
    .addExcludes([ExcludeBlock.Minutely, ExcludeBlock.Flags])
    .setLang(Lang.English)
    .setUnits(Units.CA)
    .build();

const historical = new HistoricalRequestBuilder(apiKey, lat, lon, time)
    .addExclude(ExcludeBlock.Minutely)
    .setUnits(Units.CA)
    .build();

console.log(`Input: ${lat}, ${lon}, time=${time}`);
console.log(`Forecast URL:   ${forecast.url}`);
console.log(`Historical URL: ${historical.url}`);
