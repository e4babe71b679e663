import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Min } from 'class-validator';
import { BOOKING_STATUSES, BookingStatus } from '../../database/entities/booking.entity';

export class BookingQueryDto {
    @IsOptional()
    @IsIn(BOOKING_STATUSES)
    status?: BookingStatus;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    car_id?: number;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    user_id?: number;
}
