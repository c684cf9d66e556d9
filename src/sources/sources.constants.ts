// Single tracked asset. These are part of the rule design, not deployment settings.
export const TRACKED_COIN_ID = 'ethereum';
export const REFERENCE_COIN_ID = 'bitcoin';
export const TRACKED_PAIR = 'ETHUSDT';

export const CANDLE_INTERVAL = '1h';
export const CANDLE_LIMIT = 100;
