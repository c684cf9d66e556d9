import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { Test } from '@nestjs/testing';
import { AxiosError, AxiosHeaders } from 'axios';
import { of, throwError } from 'rxjs';
import { SourceUnavailableError } from '../common/errors/market-data.errors';
import { SourceHttpService } from './source-http.service';

describe('SourceHttpService', () => {
    const get = jest.fn();
    let service: SourceHttpService;

    beforeEach(async () => {
        get.mockReset();
        jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

        const moduleRef = await Test.createTestingModule({
            providers: [
                SourceHttpService,
                { provide: HttpService, useValue: { get } },
            ],
        }).compile();

        service = moduleRef.get(SourceHttpService);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should return the response body and pass query params through', async () => {
        get.mockReturnValue(of({ data: { openInterest: '12000.5' } }));

        const body = await service.getJson('open-interest', 'http://futures.test/fapi/v1/openInterest', { symbol: 'ETHUSDT' });

        expect(body).toEqual({ openInterest: '12000.5' });
        expect(get).toHaveBeenCalledWith('http://futures.test/fapi/v1/openInterest', { params: { symbol: 'ETHUSDT' } });
    });

    it('should turn a timeout into SourceUnavailableError', async () => {
        get.mockReturnValue(throwError(() => new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED')));

        const failure = await service.getJson('price', 'http://coingecko.test/api/v3/coins/ethereum').catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(SourceUnavailableError);
        if (failure instanceof SourceUnavailableError) {
            expect(failure.source).toBe('price');
            expect(failure.message).toBe('price request failed: timed out');
        }
    });

    it('should report the status of an error response', async () => {
        const response = {
            data: {},
            status: 503,
            statusText: 'Service Unavailable',
            headers: {},
            config: { headers: new AxiosHeaders() },
        };
        get.mockReturnValue(throwError(() => new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', undefined, undefined, response)));

        await expect(service.getJson('sentiment', 'http://fng.test/fng/')).rejects.toThrow('sentiment request failed: HTTP 503');
    });

    it('should wrap non-axios failures as well', async () => {
        get.mockReturnValue(throwError(() => new Error('socket hang up')));

        const request = service.getJson('dominance', 'http://coingecko.test/api/v3/global');

        await expect(request).rejects.toBeInstanceOf(SourceUnavailableError);
        await expect(request).rejects.toThrow('dominance request failed: socket hang up');
    });
});
