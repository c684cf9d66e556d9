import { registerAs } from '@nestjs/config';

const parseTimeout = (raw: string | undefined, fallback: number): number => {
    const value = parseInt(raw ?? '', 10);
    return Number.isFinite(value) && value > 0 ? value : fallback;
};

const trimTrailingSlash = (url: string): string => url.replace(/\/+$/, '');

export default registerAs('app', () => ({
    env: process.env.NODE_ENV || 'development',
    port: parseInt(process.env.PORT || '3000', 10),
    corsOrigin: process.env.CORS_ORIGIN || '*',

    // Upstream data sources. Endpoints are overridable (mirrors, proxies); what is fetched is not.
    sources: {
        httpTimeoutMs: parseTimeout(process.env.SOURCE_HTTP_TIMEOUT_MS, 10_000),
        coingeckoBaseUrl: trimTrailingSlash(process.env.COINGECKO_BASE_URL || 'https://api.coingecko.com/api/v3'),
        binanceSpotBaseUrl: trimTrailingSlash(process.env.BINANCE_SPOT_BASE_URL || 'https://api.binance.com/api/v3'),
        binanceFuturesBaseUrl: trimTrailingSlash(process.env.BINANCE_FUTURES_BASE_URL || 'https://fapi.binance.com/fapi/v1'),
        fearGreedUrl: process.env.FEAR_GREED_URL || 'https://api.alternative.me/fng/',
        macroCalendarUrl: process.env.MACRO_CALENDAR_URL || 'https://cdn-nfs.faireconomy.media/ff_calendar_thisweek.json',
    },
}));
