import { IsOptional, IsString } from 'class-validator';

/** One entry of the weekly economic calendar feed. */
export class MacroCalendarEntryDto {
    @IsString()
    title!: string;

    @IsString()
    country!: string;

    @IsString()
    date!: string;

    @IsString()
    impact!: string;

    @IsOptional()
    @IsString()
    forecast?: string;

    @IsOptional()
    @IsString()
    previous?: string;
}
