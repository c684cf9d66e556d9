import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import appConfig from '../../config/app.config';
import { SourceHttpService } from '../../http/source-http.service';
import { MalformedResponseError } from '../../common/errors/market-data.errors';
import { parseResponse } from '../../common/validation/parse-response';
import { CoinResponseDto, GlobalResponseDto } from '../dto/coingecko.dto';
import { REFERENCE_COIN_ID } from '../sources.constants';

@Injectable()
export class DominanceSourceService {
    constructor(
        private readonly http: SourceHttpService,
        @Inject(appConfig.KEY) private readonly config: ConfigType<typeof appConfig>,
    ) { }

    /** Reference coin's share of total crypto market cap, in percent. */
    async fetchDominance(): Promise<number> {
        const baseUrl = this.config.sources.coingeckoBaseUrl;

        const coinBody = await this.http.getJson('dominance', `${baseUrl}/coins/${REFERENCE_COIN_ID}`);
        const referenceCap = parseResponse('dominance', CoinResponseDto, coinBody).market_data.market_cap.usd;

        const globalBody = await this.http.getJson('dominance', `${baseUrl}/global`);
        const totalCap = parseResponse('dominance', GlobalResponseDto, globalBody).data.total_market_cap.usd;

        if (totalCap <= 0) {
            throw new MalformedResponseError('dominance', 'Total market cap is zero');
        }
        return (referenceCap / totalCap) * 100;
    }
}
