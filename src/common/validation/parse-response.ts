import { plainToInstance, type ClassConstructor } from 'class-transformer';
import { validateSync, type ValidationError } from 'class-validator';
import { MalformedResponseError } from '../errors/market-data.errors';
import type { SourceName } from '../types/source.types';

const flattenConstraints = (errors: ValidationError[], parent = ''): string[] =>
    errors.flatMap((error) => {
        const path = parent ? `${parent}.${error.property}` : error.property;
        const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
        return [...own, ...flattenConstraints(error.children ?? [], path)];
    });

/**
 * Decodes an upstream JSON body into a validated DTO instance.
 * Anything that is not an object, or fails the DTO's constraints, is a MalformedResponseError.
 */
export function parseResponse<T extends object>(source: SourceName, dto: ClassConstructor<T>, payload: unknown): T {
    if (payload === null || typeof payload !== 'object' || Array.isArray(payload)) {
        throw new MalformedResponseError(source, `Expected a JSON object from ${source}, got ${Array.isArray(payload) ? 'array' : typeof payload}`);
    }

    const instance = plainToInstance(dto, payload);
    const errors = validateSync(instance);
    if (errors.length > 0) {
        throw new MalformedResponseError(source, `Unexpected ${source} payload (${flattenConstraints(errors).join('; ')})`);
    }
    return instance;
}

/** Same as parseResponse, for endpoints that answer with a JSON array of records. */
export function parseFirstOf<T extends object>(source: SourceName, dto: ClassConstructor<T>, payload: unknown): T {
    if (!Array.isArray(payload) || payload.length === 0) {
        throw new MalformedResponseError(source, `Expected a non-empty JSON array from ${source}`);
    }
    return parseResponse(source, dto, payload[0]);
}
