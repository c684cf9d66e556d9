export type SourceName =
    | 'price'
    | 'candles'
    | 'funding-rate'
    | 'open-interest'
    | 'dominance'
    | 'sentiment'
    | 'macro-calendar';

/**
 * Outcome of a source call that is allowed to fail without aborting the cycle.
 * The caller decides what the failure branch degrades to.
 */
export type SourceResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: Error };
