import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Matches, Min } from 'class-validator';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class DateRangeQueryDto {
    @IsString()
    @Matches(CALENDAR_DATE, { message: 'start_date must be YYYY-MM-DD' })
    start_date!: string;

    @IsString()
    @Matches(CALENDAR_DATE, { message: 'end_date must be YYYY-MM-DD' })
    end_date!: string;
}

export class SearchAvailabilityDto extends DateRangeQueryDto {
    @IsOptional()
    @IsString()
    @IsNotEmpty()
    make?: string;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(0)
    max_daily_rate_cents?: number;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    min_days?: number;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    max_days?: number;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    limit?: number;
}
