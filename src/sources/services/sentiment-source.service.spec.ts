import { Test } from '@nestjs/testing';
import appConfig from '../../config/app.config';
import { SourceHttpService } from '../../http/source-http.service';
import { MalformedResponseError } from '../../common/errors/market-data.errors';
import { testConfig } from '../../../test/fixtures';
import { SentimentSourceService } from './sentiment-source.service';

describe('SentimentSourceService', () => {
    const getJson = jest.fn();
    let service: SentimentSourceService;

    beforeEach(async () => {
        getJson.mockReset();
        const moduleRef = await Test.createTestingModule({
            providers: [
                SentimentSourceService,
                { provide: SourceHttpService, useValue: { getJson } },
                { provide: appConfig.KEY, useValue: testConfig },
            ],
        }).compile();
        service = moduleRef.get(SentimentSourceService);
    });

    it('should read the latest index value as an integer', async () => {
        getJson.mockResolvedValue({
            name: 'Fear and Greed Index',
            data: [{ value: '72', value_classification: 'Greed', timestamp: '1792281600' }],
        });

        await expect(service.fetchSentimentIndex()).resolves.toBe(72);
        expect(getJson).toHaveBeenCalledWith('sentiment', 'http://fng.test/fng/');
    });

    it('should reject an empty data list as malformed', async () => {
        getJson.mockResolvedValue({ name: 'Fear and Greed Index', data: [] });

        await expect(service.fetchSentimentIndex()).rejects.toThrow(MalformedResponseError);
    });

    it('should reject a value above 100', async () => {
        getJson.mockResolvedValue({ data: [{ value: '140' }] });

        await expect(service.fetchSentimentIndex()).rejects.toThrow('Fear & greed value out of range: 140');
    });
});
