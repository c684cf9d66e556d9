import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import appConfig from '../../config/app.config';
import { SourceHttpService } from '../../http/source-http.service';
import { parseFirstOf } from '../../common/validation/parse-response';
import { FundingRateRecordDto } from '../dto/binance.dto';
import { TRACKED_PAIR } from '../sources.constants';

@Injectable()
export class FundingRateSourceService {
    constructor(
        private readonly http: SourceHttpService,
        @Inject(appConfig.KEY) private readonly config: ConfigType<typeof appConfig>,
    ) { }

    /** Most recent settled funding rate of the perpetual. */
    async fetchFundingRate(): Promise<number> {
        const body = await this.http.getJson('funding-rate', `${this.config.sources.binanceFuturesBaseUrl}/fundingRate`, {
            symbol: TRACKED_PAIR,
            limit: 1,
        });
        const record = parseFirstOf('funding-rate', FundingRateRecordDto, body);
        return Number.parseFloat(record.fundingRate);
    }
}
