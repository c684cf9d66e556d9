import { Injectable, Logger } from '@nestjs/common';
import { InsufficientDataError, SourceUnavailableError } from '../common/errors/market-data.errors';
import { computeIndicators, type IndicatorReading } from '../indicators/indicator-calculator';
import { createMarketSnapshot, type MacroEvent, type MarketSnapshot } from '../snapshot/dto/market-snapshot.dto';
import { PriceSourceService } from '../sources/services/price-source.service';
import { CandleSourceService } from '../sources/services/candle-source.service';
import { FundingRateSourceService } from '../sources/services/funding-rate-source.service';
import { OpenInterestSourceService } from '../sources/services/open-interest-source.service';
import { DominanceSourceService } from '../sources/services/dominance-source.service';
import { SentimentSourceService } from '../sources/services/sentiment-source.service';
import { MacroCalendarSourceService } from '../sources/services/macro-calendar-source.service';

@Injectable()
export class SnapshotAggregatorService {
    private readonly logger = new Logger(SnapshotAggregatorService.name);

    constructor(
        private readonly priceSource: PriceSourceService,
        private readonly candleSource: CandleSourceService,
        private readonly fundingRateSource: FundingRateSourceService,
        private readonly openInterestSource: OpenInterestSourceService,
        private readonly dominanceSource: DominanceSourceService,
        private readonly sentimentSource: SentimentSourceService,
        private readonly macroCalendarSource: MacroCalendarSourceService,
    ) { }

    /**
     * Calls every source once, in order, and folds the answers into one snapshot.
     * Any source failure other than the macro calendar rejects the whole build.
     */
    async buildSnapshot(): Promise<MarketSnapshot> {
        const { price, marketCap, volume } = await this.priceSource.fetchMarket();
        const { rsi, macdDiff } = this.readIndicators(await this.candleSource.fetchCloses());
        const fundingRate = await this.fundingRateSource.fetchFundingRate();
        const openInterest = await this.openInterestSource.fetchOpenInterest();
        const dominance = await this.dominanceSource.fetchDominance();
        const sentimentIndex = await this.sentimentSource.fetchSentimentIndex();
        const macroEvents = await this.readMacroEvents();

        return createMarketSnapshot({
            price,
            marketCap,
            volume,
            rsi,
            macdDiff,
            fundingRate,
            openInterest,
            dominance,
            sentimentIndex,
            macroEvents,
        });
    }

    private readIndicators(closes: number[]): IndicatorReading {
        try {
            return computeIndicators(closes);
        } catch (error) {
            if (error instanceof InsufficientDataError) {
                throw new SourceUnavailableError('candles', `Candle series unusable: ${error.message}`, { cause: error });
            }
            throw error;
        }
    }

    private async readMacroEvents(): Promise<MacroEvent[]> {
        const result = await this.macroCalendarSource.tryFetchEvents();
        if (result.ok) return result.value;

        this.logger.warn(`Macro calendar unavailable, continuing without events: ${result.error.message}`);
        return [];
    }
}
