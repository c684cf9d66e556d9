// One upcoming entry from the weekly macro calendar.
export type MacroEvent = {
    title: string;
    country: string;
    date: string; // ISO 8601, as published by the calendar
    impact: string;
    forecast?: string;
    previous?: string;
};

// Everything the decision rule looks at for one polling cycle.
export interface MarketSnapshot {
    readonly price: number; // spot, USD
    readonly marketCap: number;
    readonly volume: number;
    readonly rsi: number; // 0..100
    readonly macdDiff: number; // MACD line minus signal line
    readonly fundingRate: number;
    readonly openInterest: number;
    readonly dominance: number; // BTC share of total cap, 0..100
    readonly sentimentIndex: number; // fear & greed, integer 0..100
    readonly macroEvents: readonly MacroEvent[];
}

export const EMPTY_SNAPSHOT: MarketSnapshot = Object.freeze({
    price: 0,
    marketCap: 0,
    volume: 0,
    rsi: 0,
    macdDiff: 0,
    fundingRate: 0,
    openInterest: 0,
    dominance: 0,
    sentimentIndex: 0,
    macroEvents: Object.freeze([]),
});

/**
 * Builds a frozen snapshot. Fields not supplied keep their neutral zero default,
 * so a snapshot is always complete.
 */
export function createMarketSnapshot(fields: Partial<MarketSnapshot> = {}): MarketSnapshot {
    const macroEvents = Object.freeze([...(fields.macroEvents ?? [])]);
    return Object.freeze({ ...EMPTY_SNAPSHOT, ...fields, macroEvents });
}
