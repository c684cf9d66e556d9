import { Test } from '@nestjs/testing';
import appConfig from '../../config/app.config';
import { SourceHttpService } from '../../http/source-http.service';
import { MalformedResponseError, SourceUnavailableError } from '../../common/errors/market-data.errors';
import { testConfig } from '../../../test/fixtures';
import { PriceSourceService } from './price-source.service';

describe('PriceSourceService', () => {
    const getJson = jest.fn();
    let service: PriceSourceService;

    beforeEach(async () => {
        getJson.mockReset();
        const moduleRef = await Test.createTestingModule({
            providers: [
                PriceSourceService,
                { provide: SourceHttpService, useValue: { getJson } },
                { provide: appConfig.KEY, useValue: testConfig },
            ],
        }).compile();
        service = moduleRef.get(PriceSourceService);
    });

    it('should read price, market cap and volume in USD', async () => {
        getJson.mockResolvedValue({
            id: 'ethereum',
            market_data: {
                current_price: { usd: 3612.45, eur: 3321.1 },
                market_cap: { usd: 434_100_000_000 },
                total_volume: { usd: 17_250_000_000 },
            },
        });

        await expect(service.fetchMarket()).resolves.toEqual({
            price: 3612.45,
            marketCap: 434_100_000_000,
            volume: 17_250_000_000,
        });
        expect(getJson).toHaveBeenCalledWith('price', 'http://coingecko.test/api/v3/coins/ethereum');
    });

    it('should reject a body without market data as malformed', async () => {
        getJson.mockResolvedValue({ id: 'ethereum' });

        const failure = await service.fetchMarket().catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(MalformedResponseError);
        expect(failure).toBeInstanceOf(SourceUnavailableError);
    });

    it('should reject a non-numeric price as malformed', async () => {
        getJson.mockResolvedValue({
            market_data: {
                current_price: { usd: 'n/a' },
                market_cap: { usd: 1 },
                total_volume: { usd: 1 },
            },
        });

        await expect(service.fetchMarket()).rejects.toThrow(MalformedResponseError);
    });
});
