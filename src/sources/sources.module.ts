import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from '../config/app.config';
import { PriceSourceService } from './services/price-source.service';
import { CandleSourceService } from './services/candle-source.service';
import { FundingRateSourceService } from './services/funding-rate-source.service';
import { OpenInterestSourceService } from './services/open-interest-source.service';
import { DominanceSourceService } from './services/dominance-source.service';
import { SentimentSourceService } from './services/sentiment-source.service';
import { MacroCalendarSourceService } from './services/macro-calendar-source.service';

const SOURCE_SERVICES = [
    PriceSourceService,
    CandleSourceService,
    FundingRateSourceService,
    OpenInterestSourceService,
    DominanceSourceService,
    SentimentSourceService,
    MacroCalendarSourceService,
];

@Module({
    imports: [ConfigModule.forFeature(appConfig)],
    providers: SOURCE_SERVICES,
    exports: SOURCE_SERVICES,
})
export class SourcesModule { }
