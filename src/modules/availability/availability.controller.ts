import { Controller, Get, Param, ParseIntPipe, Query, UseGuards } from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CurrentUser } from '../auth/current-user.decorator';
import { Actor } from '../auth/interfaces/actor.interface';
import { assertCan } from '../auth/capabilities';
import { createDateRange, durationDays } from '../../common/date-range';
import { AvailabilityService, AvailabilityVerdict } from './availability.service';
import { DateRangeQueryDto, SearchAvailabilityDto } from './dto/search-availability.dto';
import { AvailableCarDto } from './dto/available-car.dto';

@Controller('api/availability')
@UseGuards(JwtAuthGuard)
export class AvailabilityController {
    constructor(private readonly availabilityService: AvailabilityService) { }

    /**
     * Cars free for the whole range, ordered by id
     */
    @Get()
    async searchAvailableCars(
        @CurrentUser() actor: Actor,
        @Query() query: SearchAvailabilityDto,
    ) {
        assertCan(actor, 'availability:search');
        const range = createDateRange(query.start_date, query.end_date);
        const rentalDays = durationDays(range);

        const cars = await this.availabilityService
            .search(range, {
                make: query.make,
                max_daily_rate_cents: query.max_daily_rate_cents,
                min_days: query.min_days,
                max_days: query.max_days,
            })
            .toArray(query.limit);

        return {
            start_date: range.start,
            end_date: range.end,
            rental_days: rentalDays,
            cars: cars.map(car => new AvailableCarDto(car, rentalDays)),
        };
    }

    /**
     * Whether one car is free for the range, and what blocks it if not
     */
    @Get('cars/:id')
    async checkCar(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
        @Query() query: DateRangeQueryDto,
    ): Promise<AvailabilityVerdict> {
        assertCan(actor, 'availability:search');
        return this.availabilityService.checkVehicle(id, createDateRange(query.start_date, query.end_date));
    }
}
