import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import appConfig from '../../config/app.config';
import { SourceHttpService } from '../../http/source-http.service';
import { parseResponse } from '../../common/validation/parse-response';
import { CoinResponseDto } from '../dto/coingecko.dto';
import { TRACKED_COIN_ID } from '../sources.constants';

export interface PriceMarketReading {
    price: number;
    marketCap: number;
    volume: number;
}

@Injectable()
export class PriceSourceService {
    constructor(
        private readonly http: SourceHttpService,
        @Inject(appConfig.KEY) private readonly config: ConfigType<typeof appConfig>,
    ) { }

    async fetchMarket(): Promise<PriceMarketReading> {
        const body = await this.http.getJson('price', `${this.config.sources.coingeckoBaseUrl}/coins/${TRACKED_COIN_ID}`);
        const { market_data: data } = parseResponse('price', CoinResponseDto, body);

        return {
            price: data.current_price.usd,
            marketCap: data.market_cap.usd,
            volume: data.total_volume.usd,
        };
    }
}
