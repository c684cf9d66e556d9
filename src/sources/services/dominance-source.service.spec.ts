import { Test } from '@nestjs/testing';
import appConfig from '../../config/app.config';
import { SourceHttpService } from '../../http/source-http.service';
import { MalformedResponseError, SourceUnavailableError } from '../../common/errors/market-data.errors';
import { testConfig } from '../../../test/fixtures';
import { DominanceSourceService } from './dominance-source.service';

const bitcoin = (marketCap: number) => ({
    market_data: {
        current_price: { usd: 67000 },
        market_cap: { usd: marketCap },
        total_volume: { usd: 30_000_000_000 },
    },
});

const globalStats = (totalCap: number) => ({ data: { total_market_cap: { usd: totalCap, btc: 33_000_000 } } });

describe('DominanceSourceService', () => {
    const getJson = jest.fn();
    let service: DominanceSourceService;

    beforeEach(async () => {
        getJson.mockReset();
        const moduleRef = await Test.createTestingModule({
            providers: [
                DominanceSourceService,
                { provide: SourceHttpService, useValue: { getJson } },
                { provide: appConfig.KEY, useValue: testConfig },
            ],
        }).compile();
        service = moduleRef.get(DominanceSourceService);
    });

    it('should divide the reference cap by the total cap', async () => {
        getJson
            .mockResolvedValueOnce(bitcoin(1_200_000_000_000))
            .mockResolvedValueOnce(globalStats(2_000_000_000_000));

        await expect(service.fetchDominance()).resolves.toBe(60);
        expect(getJson).toHaveBeenNthCalledWith(1, 'dominance', 'http://coingecko.test/api/v3/coins/bitcoin');
        expect(getJson).toHaveBeenNthCalledWith(2, 'dominance', 'http://coingecko.test/api/v3/global');
    });

    it('should reject a zero total market cap', async () => {
        getJson
            .mockResolvedValueOnce(bitcoin(1_200_000_000_000))
            .mockResolvedValueOnce(globalStats(0));

        await expect(service.fetchDominance()).rejects.toThrow(new MalformedResponseError('dominance', 'Total market cap is zero'));
    });

    it('should fail when either sub-fetch fails', async () => {
        getJson
            .mockResolvedValueOnce(bitcoin(1_200_000_000_000))
            .mockRejectedValueOnce(new SourceUnavailableError('dominance', 'dominance request failed: HTTP 429'));

        await expect(service.fetchDominance()).rejects.toThrow('dominance request failed: HTTP 429');
    });
});
