import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import appConfig from '../../config/app.config';
import { SourceHttpService } from '../../http/source-http.service';
import { MalformedResponseError } from '../../common/errors/market-data.errors';
import { parseResponse } from '../../common/validation/parse-response';
import { FearGreedResponseDto } from '../dto/fear-greed.dto';

@Injectable()
export class SentimentSourceService {
    constructor(
        private readonly http: SourceHttpService,
        @Inject(appConfig.KEY) private readonly config: ConfigType<typeof appConfig>,
    ) { }

    /** Latest fear & greed reading. */
    async fetchSentimentIndex(): Promise<number> {
        const body = await this.http.getJson('sentiment', this.config.sources.fearGreedUrl);
        const { data } = parseResponse('sentiment', FearGreedResponseDto, body);

        const value = Number.parseInt(data[0].value, 10);
        if (value < 0 || value > 100) {
            throw new MalformedResponseError('sentiment', `Fear & greed value out of range: ${data[0].value}`);
        }
        return value;
    }
}
