import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BookingsRepository } from '../database/repositories/bookings.repository';
import { MaintenanceRepository } from '../database/repositories/maintenance.repository';
import { Queryable } from '../database/interfaces/queryable.interface';
import { DateRange, overlaps, windowOverlaps } from '../../common/date-range';
import { ConflictDetail } from '../../common/errors/rental.errors';
import { CandidateFilters, CarsService } from '../cars/cars.service';
import { AvailabilitySearch } from './availability-search';

const DEFAULT_PAGE_SIZE = 50;

export interface ConflictCheckOptions {
    /** Leave this booking out, so a pending booking does not conflict with itself. */
    excludeBookingId?: number;
    /** Transaction handle; reads go through the pool when omitted. */
    db?: Queryable;
}

export interface AvailabilityVerdict {
    car_id: number;
    start_date: string;
    end_date: string;
    available: boolean;
    conflicts: ConflictDetail[];
}

/**
 * The one place that decides whether a car is free for a range. Search,
 * booking creation and booking approval all go through findConflicts.
 */
@Injectable()
export class AvailabilityService {
    private readonly logger = new Logger(AvailabilityService.name);
    private readonly pageSize: number;

    constructor(
        private readonly carsService: CarsService,
        private readonly bookingsRepository: BookingsRepository,
        private readonly maintenanceRepository: MaintenanceRepository,
        configService: ConfigService,
    ) {
        this.pageSize = configService.get<number>('AVAILABILITY_PAGE_SIZE') ?? DEFAULT_PAGE_SIZE;
    }

    /**
     * Approved bookings and maintenance windows of the car that overlap `range`
     */
    async findConflicts(carId: number, range: DateRange, options: ConflictCheckOptions = {}): Promise<ConflictDetail[]> {
        const bookings = await this.bookingsRepository.findApprovedOverlapping(carId, range, options.db);
        const windows = await this.maintenanceRepository.findOverlapping(carId, range, options.db);

        const bookingConflicts: ConflictDetail[] = bookings
            .filter(booking => booking.id !== options.excludeBookingId)
            .filter(booking => overlaps({ start: booking.start_date, end: booking.end_date }, range))
            .map(booking => ({
                kind: 'booking',
                id: booking.id,
                start_date: booking.start_date,
                end_date: booking.end_date,
            }));

        const maintenanceConflicts: ConflictDetail[] = windows
            .filter(window => windowOverlaps(window, range))
            .map(window => ({
                kind: 'maintenance',
                id: window.id,
                start_date: window.start_date,
                end_date: window.end_date,
            }));

        return [...bookingConflicts, ...maintenanceConflicts];
    }

    /**
     * Availability of one car, with whatever blocks it
     */
    async checkVehicle(carId: number, range: DateRange): Promise<AvailabilityVerdict> {
        await this.carsService.requireCar(carId);
        const conflicts = await this.findConflicts(carId, range);
        return {
            car_id: carId,
            start_date: range.start,
            end_date: range.end,
            available: conflicts.length === 0,
            conflicts,
        };
    }

    async isAvailable(carId: number, range: DateRange): Promise<boolean> {
        const verdict = await this.checkVehicle(carId, range);
        return verdict.available;
    }

    /**
     * Cars offered for `range` that nothing blocks, as a lazy sequence ordered by id
     */
    search(range: DateRange, filters: CandidateFilters = {}): AvailabilitySearch {
        this.logger.debug(`🔍 Availability search ${range.start} -> ${range.end}`);
        return new AvailabilitySearch(
            (afterId, limit) => this.carsService.candidatesFor(range, filters, afterId, limit),
            async (car) => (await this.findConflicts(car.id, range)).length === 0,
            this.pageSize,
        );
    }
}
