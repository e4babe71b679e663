import { Type } from 'class-transformer';
import {
    ArrayMaxSize,
    IsArray,
    IsInt,
    IsNotEmpty,
    IsOptional,
    IsString,
    Matches,
    Max,
    MaxLength,
    Min,
    ValidateNested,
} from 'class-validator';
import { MAX_AMOUNT_CENTS, MAX_EXTRAS } from '../../../common/limits';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class ChargeDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(50)
    code!: string;

    @IsInt()
    @Min(-MAX_AMOUNT_CENTS)
    @Max(MAX_AMOUNT_CENTS)
    amount_cents!: number;
}

export class CreateBookingDto {
    @IsInt()
    @Min(1)
    car_id!: number;

    @IsString()
    @Matches(CALENDAR_DATE, { message: 'start_date must be YYYY-MM-DD' })
    start_date!: string;

    @IsString()
    @Matches(CALENDAR_DATE, { message: 'end_date must be YYYY-MM-DD' })
    end_date!: string;

    // Admins may book on behalf of a customer
    @IsOptional()
    @IsInt()
    @Min(1)
    user_id?: number;

    @IsOptional()
    @IsArray()
    @ArrayMaxSize(MAX_EXTRAS)
    @ValidateNested({ each: true })
    @Type(() => ChargeDto)
    extras?: ChargeDto[];
}
