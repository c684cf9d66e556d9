import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import appConfig from '../../config/app.config';
import { SourceHttpService } from '../../http/source-http.service';
import { MalformedResponseError } from '../../common/errors/market-data.errors';
import { parseResponse } from '../../common/validation/parse-response';
import { OpenInterestResponseDto } from '../dto/binance.dto';
import { TRACKED_PAIR } from '../sources.constants';

@Injectable()
export class OpenInterestSourceService {
    constructor(
        private readonly http: SourceHttpService,
        @Inject(appConfig.KEY) private readonly config: ConfigType<typeof appConfig>,
    ) { }

    async fetchOpenInterest(): Promise<number> {
        const body = await this.http.getJson('open-interest', `${this.config.sources.binanceFuturesBaseUrl}/openInterest`, {
            symbol: TRACKED_PAIR,
        });
        const { openInterest } = parseResponse('open-interest', OpenInterestResponseDto, body);

        const value = Number.parseFloat(openInterest);
        if (value < 0) {
            throw new MalformedResponseError('open-interest', `Negative open interest: ${openInterest}`);
        }
        return value;
    }
}
