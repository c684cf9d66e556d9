import { Type } from 'class-transformer';
import { IsDefined, IsNumber, Min, ValidateNested } from 'class-validator';

export class UsdQuoteDto {
    @IsNumber({ allowNaN: false, allowInfinity: false })
    @Min(0)
    usd!: number;
}

export class CoinMarketDataDto {
    @IsDefined()
    @ValidateNested()
    @Type(() => UsdQuoteDto)
    current_price!: UsdQuoteDto;

    @IsDefined()
    @ValidateNested()
    @Type(() => UsdQuoteDto)
    market_cap!: UsdQuoteDto;

    @IsDefined()
    @ValidateNested()
    @Type(() => UsdQuoteDto)
    total_volume!: UsdQuoteDto;
}

/** GET /coins/{id} — only the fields we read. */
export class CoinResponseDto {
    @IsDefined()
    @ValidateNested()
    @Type(() => CoinMarketDataDto)
    market_data!: CoinMarketDataDto;
}

export class GlobalDataDto {
    @IsDefined()
    @ValidateNested()
    @Type(() => UsdQuoteDto)
    total_market_cap!: UsdQuoteDto;
}

/** GET /global */
export class GlobalResponseDto {
    @IsDefined()
    @ValidateNested()
    @Type(() => GlobalDataDto)
    data!: GlobalDataDto;
}
