import { describe, it, expect, afterEach, vi } from 'vitest';
import { DEFAULT_FORECAST_BASE_URL, getApiKey, getForecastBaseUrl, isDebugLoggingEnabled } from '../config';

describe('Configuration', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('falls back to the public endpoint', () => {
        vi.stubEnv('FORECAST_BASE_URL', '');
        expect(getForecastBaseUrl()).toBe(DEFAULT_FORECAST_BASE_URL);
    });

    it('trims the override and drops trailing slashes', () => {
        vi.stubEnv('FORECAST_BASE_URL', '  http://localhost:8787/forecast//  ');
        expect(getForecastBaseUrl()).toBe('http://localhost:8787/forecast');
    });

    it('requires an API key', () => {
        vi.stubEnv('FORECAST_API_KEY', ' ');
        expect(() => getApiKey()).toThrow(/FORECAST_API_KEY/);
        vi.stubEnv('FORECAST_API_KEY', 'test-secret');
        expect(getApiKey()).toBe('test-secret');
    });

    it('parses the debug flag', () => {
        vi.stubEnv('FORECAST_DEBUG', 'YES');
        expect(isDebugLoggingEnabled()).toBe(true);
        vi.stubEnv('FORECAST_DEBUG', '0');
        expect(isDebugLoggingEnabled()).toBe(false);
    });
});
