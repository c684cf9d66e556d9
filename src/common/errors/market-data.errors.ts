import type { SourceName } from '../types/source.types';

export class MarketDataError extends Error {
    constructor(
        readonly source: SourceName,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Any adapter I/O failure: timeout, transport error, non-2xx status. */
export class SourceUnavailableError extends MarketDataError { }

/** The source answered, but not with something we can read. Handled like an outage. */
export class MalformedResponseError extends SourceUnavailableError { }

export class InsufficientDataError extends Error {
    constructor(
        readonly required: number,
        readonly received: number,
    ) {
        super(`Need at least ${required} closing prices, got ${received}`);
        this.name = new.target.name;
    }
}

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
