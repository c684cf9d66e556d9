import type { MarketSnapshot } from '../snapshot/dto/market-snapshot.dto';

export enum TradeSignal {
    LONG = 'LONG',
    SHORT = 'SHORT',
}

/** The line written out for each signal. */
export const SIGNAL_MESSAGES: Record<TradeSignal, string> = {
    [TradeSignal.LONG]: 'GO LONG',
    [TradeSignal.SHORT]: 'SELL',
};

export const RSI_BULLISH_ABOVE = 60;
export const RSI_BEARISH_BELOW = 40;
export const REFERENCE_PRICE = 3550;
export const DOMINANCE_PIVOT = 59.5;
export const SENTIMENT_GREED_ABOVE = 60;
export const SENTIMENT_FEAR_BELOW = 40;

const isLongSetup = (s: MarketSnapshot, previousOpenInterest: number): boolean =>
    s.rsi > RSI_BULLISH_ABOVE &&
    s.macdDiff > 0 &&
    s.price > REFERENCE_PRICE &&
    s.dominance < DOMINANCE_PIVOT &&
    s.fundingRate <= 0 &&
    s.openInterest > previousOpenInterest &&
    s.sentimentIndex > SENTIMENT_GREED_ABOVE;

const isShortSetup = (s: MarketSnapshot, previousOpenInterest: number): boolean =>
    s.rsi < RSI_BEARISH_BELOW &&
    s.macdDiff < 0 &&
    s.price < REFERENCE_PRICE &&
    s.dominance > DOMINANCE_PIVOT &&
    s.fundingRate > 0 &&
    s.openInterest < previousOpenInterest &&
    s.sentimentIndex < SENTIMENT_FEAR_BELOW;

/**
 * Every condition of a side must hold for it to fire. Without an open-interest
 * reading from the previous cycle nothing fires. LONG is checked first; the two
 * rule sets cannot both hold with these thresholds.
 */
export function evaluateSignal(snapshot: MarketSnapshot, previousOpenInterest: number | null): TradeSignal | null {
    if (previousOpenInterest === null) return null;

    if (isLongSetup(snapshot, previousOpenInterest)) return TradeSignal.LONG;
    if (isShortSetup(snapshot, previousOpenInterest)) return TradeSignal.SHORT;
    return null;
}
