import { IsInt, IsNotEmpty, IsOptional, IsString, Matches, Max, MaxLength, Min } from 'class-validator';
import { MAX_AMOUNT_CENTS } from '../../../common/limits';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class OpenMaintenanceDto {
    @IsInt()
    @Min(1)
    car_id!: number;

    @IsString()
    @IsNotEmpty()
    @MaxLength(50)
    type!: string;

    @IsString()
    @Matches(CALENDAR_DATE, { message: 'start_date must be YYYY-MM-DD' })
    start_date!: string;

    // Last day in the shop; omit while the return date is unknown
    @IsOptional()
    @IsString()
    @Matches(CALENDAR_DATE, { message: 'end_date must be YYYY-MM-DD' })
    end_date?: string;

    @IsOptional()
    @IsInt()
    @Min(0)
    @Max(MAX_AMOUNT_CENTS)
    cost_cents?: number;

    @IsOptional()
    @IsString()
    @MaxLength(2000)
    notes?: string;
}

export class CloseMaintenanceDto {
    @IsOptional()
    @IsString()
    @Matches(CALENDAR_DATE, { message: 'end_date must be YYYY-MM-DD' })
    end_date?: string;

    @IsOptional()
    @IsString()
    @MaxLength(2000)
    notes?: string;
}
