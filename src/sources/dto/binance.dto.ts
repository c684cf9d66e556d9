import { IsNumberString } from 'class-validator';

/** One record of GET /fapi/v1/fundingRate. */
export class FundingRateRecordDto {
    @IsNumberString()
    fundingRate!: string;
}

/** GET /fapi/v1/openInterest */
export class OpenInterestResponseDto {
    @IsNumberString()
    openInterest!: string;
}

// Spot kline row: [openTime, open, high, low, close, volume, closeTime, ...]
export type KlineRow = [number, string, string, string, string, string, number, ...unknown[]];

export const KLINE_CLOSE_INDEX = 4;
export const KLINE_CLOSE_TIME_INDEX = 6;

export function isKlineRow(row: unknown): row is KlineRow {
    return (
        Array.isArray(row) &&
        row.length > KLINE_CLOSE_TIME_INDEX &&
        typeof row[KLINE_CLOSE_INDEX] === 'string' &&
        Number.isFinite(Number.parseFloat(row[KLINE_CLOSE_INDEX])) &&
        typeof row[KLINE_CLOSE_TIME_INDEX] === 'number'
    );
}
