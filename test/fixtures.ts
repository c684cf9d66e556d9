import type { ConfigType } from '@nestjs/config';
import type appConfig from '../src/config/app.config';

export const testConfig: ConfigType<typeof appConfig> = {
    env: 'test',
    port: 0,
    corsOrigin: '*',
    sources: {
        httpTimeoutMs: 1000,
        coingeckoBaseUrl: 'http://coingecko.test/api/v3',
        binanceSpotBaseUrl: 'http://spot.test/api/v3',
        binanceFuturesBaseUrl: 'http://futures.test/fapi/v1',
        fearGreedUrl: 'http://fng.test/fng/',
        macroCalendarUrl: 'http://calendar.test/thisweek.json',
    },
};

/** `count` closes rising by `step` from `start`. */
export const risingCloses = (count: number, start = 3000, step = 5): number[] =>
    Array.from({ length: count }, (_, i) => start + i * step);

/** `count` closes falling by `step` from `start`. */
export const fallingCloses = (count: number, start = 4000, step = 5): number[] =>
    Array.from({ length: count }, (_, i) => start - i * step);
