import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import appConfig from '../../config/app.config';
import { SourceHttpService } from '../../http/source-http.service';
import { MalformedResponseError } from '../../common/errors/market-data.errors';
import type { SourceResult } from '../../common/types/source.types';
import type { MacroEvent } from '../../snapshot/dto/market-snapshot.dto';
import { MacroCalendarEntryDto } from '../dto/macro-calendar.dto';

@Injectable()
export class MacroCalendarSourceService {
    private readonly logger = new Logger(MacroCalendarSourceService.name);

    constructor(
        private readonly http: SourceHttpService,
        @Inject(appConfig.KEY) private readonly config: ConfigType<typeof appConfig>,
    ) { }

    /**
     * This week's calendar. Never rejects: a failed fetch or unreadable body comes
     * back as `{ ok: false }` for the caller to degrade.
     */
    async tryFetchEvents(): Promise<SourceResult<MacroEvent[]>> {
        try {
            return { ok: true, value: await this.fetchEvents() };
        } catch (error) {
            return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
        }
    }

    private async fetchEvents(): Promise<MacroEvent[]> {
        const body = await this.http.getJson('macro-calendar', this.config.sources.macroCalendarUrl);
        if (!Array.isArray(body)) {
            throw new MalformedResponseError('macro-calendar', 'Expected a JSON array of calendar entries');
        }

        const rows: unknown[] = body;
        const events: MacroEvent[] = [];
        let skipped = 0;

        for (const raw of rows) {
            if (!raw || typeof raw !== 'object') {
                skipped++;
                continue;
            }
            const entry = plainToInstance(MacroCalendarEntryDto, raw);
            if (validateSync(entry).length > 0) {
                skipped++;
                continue;
            }

            const event: MacroEvent = {
                title: entry.title,
                country: entry.country,
                date: entry.date,
                impact: entry.impact,
            };
            if (entry.forecast !== undefined) event.forecast = entry.forecast;
            if (entry.previous !== undefined) event.previous = entry.previous;
            events.push(event);
        }

        if (skipped > 0) {
            this.logger.debug(`Skipped ${skipped} unreadable calendar entries`);
        }
        return events;
    }
}
