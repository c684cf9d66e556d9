import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { SourceUnavailableError, describeError } from '../common/errors/market-data.errors';
import type { SourceName } from '../common/types/source.types';

/**
 * Thin GET wrapper shared by every source adapter. Transport failures of any kind
 * (timeout, DNS, non-2xx) come out as SourceUnavailableError tagged with the source.
 */
@Injectable()
export class SourceHttpService {
    private readonly logger = new Logger(SourceHttpService.name);

    constructor(private readonly httpService: HttpService) { }

    async getJson(source: SourceName, url: string, params?: Record<string, string | number>): Promise<unknown> {
        const startTime = performance.now();

        try {
            const { data } = await firstValueFrom(this.httpService.get<unknown>(url, { params }));
            return data;
        } catch (error) {
            throw new SourceUnavailableError(source, `${source} request failed: ${this.describeFailure(error)}`, { cause: error });
        } finally {
            const duration = performance.now() - startTime;
            if (duration > 3000) {
                this.logger.warn(`Slow ${source} fetch: ${duration.toFixed(0)}ms (${url})`);
            }
        }
    }

    private describeFailure(error: unknown): string {
        if (isAxiosError(error)) {
            if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') return 'timed out';
            if (error.response) return `HTTP ${error.response.status}`;
            return error.code ?? error.message;
        }
        return describeError(error);
    }
}
