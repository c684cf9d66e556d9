import { AverageGain, AverageLoss, MACD } from 'technicalindicators';
import { InsufficientDataError } from '../common/errors/market-data.errors';

export const RSI_PERIOD = 14;
export const MACD_FAST_PERIOD = 12;
export const MACD_SLOW_PERIOD = 26;
export const MACD_SIGNAL_PERIOD = 9;

/** Shortest close series the calculator accepts. */
export const MIN_CLOSES = MACD_SLOW_PERIOD;

export interface IndicatorReading {
    rsi: number;
    macdDiff: number;
}

/**
 * RSI(14) with Wilder smoothing and the MACD(12, 26, 9) histogram, both read at the
 * last position of `closes` (oldest first).
 *
 * RSI is built from the smoothed gain and loss series rather than `RSI.calculate`,
 * which rounds to two decimals and would move readings across the 60/40 thresholds.
 *
 * Between 26 and 33 closes the MACD line exists but its 9-period signal line does not
 * yet; the histogram is then reported as 0.
 */
export function computeIndicators(closes: readonly number[]): IndicatorReading {
    if (closes.length < MIN_CLOSES) {
        throw new InsufficientDataError(MIN_CLOSES, closes.length);
    }

    const values = [...closes];

    const rsi = relativeStrengthIndex(values);

    const macdSeries = MACD.calculate({
        values,
        fastPeriod: MACD_FAST_PERIOD,
        slowPeriod: MACD_SLOW_PERIOD,
        signalPeriod: MACD_SIGNAL_PERIOD,
        SimpleMAOscillator: false,
        SimpleMASignal: false,
    });
    const histogram = macdSeries[macdSeries.length - 1]?.histogram;

    return {
        rsi,
        macdDiff: histogram !== undefined && Number.isFinite(histogram) ? histogram : 0,
    };
}

function relativeStrengthIndex(values: number[]): number {
    const gains = AverageGain.calculate({ values, period: RSI_PERIOD });
    const losses = AverageLoss.calculate({ values, period: RSI_PERIOD });
    const gain = gains[gains.length - 1];
    const loss = losses[losses.length - 1];

    if (gain === undefined || loss === undefined) return 0;
    if (loss === 0) return 100;
    return 100 - 100 / (1 + gain / loss);
}
