import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import appConfig from '../../config/app.config';
import { SourceHttpService } from '../../http/source-http.service';
import { MalformedResponseError } from '../../common/errors/market-data.errors';
import { MIN_CLOSES } from '../../indicators/indicator-calculator';
import { KLINE_CLOSE_INDEX, KLINE_CLOSE_TIME_INDEX, isKlineRow } from '../dto/binance.dto';
import { CANDLE_INTERVAL, CANDLE_LIMIT, TRACKED_PAIR } from '../sources.constants';

@Injectable()
export class CandleSourceService {
    constructor(
        private readonly http: SourceHttpService,
        @Inject(appConfig.KEY) private readonly config: ConfigType<typeof appConfig>,
    ) { }

    /**
     * Closing prices of the last closed candles, oldest first. The candle still
     * forming at `now` is left out.
     */
    async fetchCloses(now: number = Date.now()): Promise<number[]> {
        const body = await this.http.getJson('candles', `${this.config.sources.binanceSpotBaseUrl}/klines`, {
            symbol: TRACKED_PAIR,
            interval: CANDLE_INTERVAL,
            limit: CANDLE_LIMIT,
        });

        if (!Array.isArray(body)) {
            throw new MalformedResponseError('candles', 'Expected a JSON array of klines');
        }
        if (!body.every(isKlineRow)) {
            throw new MalformedResponseError('candles', 'Kline rows do not carry a numeric close and close time');
        }

        const closes = body
            .filter((row) => row[KLINE_CLOSE_TIME_INDEX] < now)
            .map((row) => Number.parseFloat(row[KLINE_CLOSE_INDEX]));

        if (closes.length < MIN_CLOSES) {
            throw new MalformedResponseError('candles', `Only ${closes.length} closed candles returned, need ${MIN_CLOSES}`);
        }
        return closes;
    }
}
