import { Type } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsNumberString, ValidateNested } from 'class-validator';

export class FearGreedEntryDto {
    @IsNumberString({ no_symbols: true })
    value!: string;
}

/** GET alternative.me /fng/ */
export class FearGreedResponseDto {
    @IsArray()
    @ArrayNotEmpty()
    @ValidateNested({ each: true })
    @Type(() => FearGreedEntryDto)
    data!: FearGreedEntryDto[];
}
