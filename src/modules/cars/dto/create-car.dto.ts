import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { MAX_DAILY_RATE_CENTS, MAX_MILEAGE, MAX_RENT_DAYS } from '../../../common/limits';

export class CreateCarDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(100)
    make!: string;

    @IsString()
    @IsNotEmpty()
    @MaxLength(100)
    model!: string;

    @IsInt()
    @Min(1950)
    @Max(new Date().getFullYear() + 1)
    year!: number;

    @IsString()
    @IsNotEmpty()
    @MaxLength(50)
    color!: string;

    @IsOptional()
    @IsInt()
    @Min(0)
    @Max(MAX_MILEAGE)
    mileage?: number;

    @IsInt()
    @Min(0)
    @Max(MAX_DAILY_RATE_CENTS)
    daily_rate_cents!: number;

    @IsOptional()
    @IsBoolean()
    available_now?: boolean;

    @IsOptional()
    @IsInt()
    @Min(1)
    @Max(MAX_RENT_DAYS)
    min_rent_days?: number;

    @IsOptional()
    @IsInt()
    @Min(1)
    @Max(MAX_RENT_DAYS)
    max_rent_days?: number;
}
