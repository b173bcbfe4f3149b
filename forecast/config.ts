/**
 * Centralized configuration for the forecast client.
 *
 * All environment-dependent values should be accessed through this module.
 */

export const DEFAULT_FORECAST_BASE_URL = 'https://api.pirateweather.net/forecast';

/**
 * Get the endpoint base URL that request paths are appended to.
 *
 * Priority:
 * 1. FORECAST_BASE_URL environment variable (self-hosted or staging mirrors)
 * 2. The public Pirate Weather endpoint
 */
export function getForecastBaseUrl(): string {
    const raw = readEnv('FORECAST_BASE_URL');
    if (!raw) return DEFAULT_FORECAST_BASE_URL;
    return raw.replace(/\/+$/, '');
}

/**
 * Get the API key. Throws if missing.
 */
export function getApiKey(): string {
    const key = readEnv('FORECAST_API_KEY');
    if (!key) {
        throw new Error('Missing FORECAST_API_KEY');
    }
    return key;
}

/**
 * Per-request debug logging, off unless FORECAST_DEBUG is 1/true/yes.
 */
export function isDebugLoggingEnabled(): boolean {
    const flag = (readEnv('FORECAST_DEBUG') ?? '').toLowerCase();
    return flag === '1' || flag === 'true' || flag === 'yes';
}

function readEnv(name: string): string | undefined {
    if (typeof process === 'undefined') return undefined;
    const value = process.env[name]?.trim();
    return value ? value : undefined;
}
