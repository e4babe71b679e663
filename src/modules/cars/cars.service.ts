import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { CarsRepository } from '../database/repositories/cars.repository';
import { BookingsRepository } from '../database/repositories/bookings.repository';
import { MaintenanceRepository } from '../database/repositories/maintenance.repository';
import { Queryable } from '../database/interfaces/queryable.interface';
import { Car, CarFilters, UpdateCarData } from '../database/entities/car.entity';
import { DateRange, durationDays } from '../../common/date-range';
import { InvalidRangeException, RecordNotFoundException } from '../../common/errors/rental.errors';
import { Actor } from '../auth/interfaces/actor.interface';
import { assertCan } from '../auth/capabilities';
import { CreateCarDto } from './dto/create-car.dto';
import { UpdateCarDto } from './dto/update-car.dto';
import { CarResponseDto } from './dto/car-response.dto';

const DEFAULT_MIN_RENT_DAYS = 1;
const DEFAULT_MAX_RENT_DAYS = 30;

export interface CandidateFilters {
    make?: string;
    max_daily_rate_cents?: number;
    /** Only offer cars when the requested duration is at least this long. */
    min_days?: number;
    /** Only offer cars when the requested duration is at most this long. */
    max_days?: number;
}

export function assertRentalDayBounds(minDays: number, maxDays: number): void {
    if (!Number.isInteger(minDays) || minDays < 1) {
        throw new InvalidRangeException('min_rent_days must be a whole number of at least 1');
    }
    if (!Number.isInteger(maxDays) || maxDays < minDays) {
        throw new InvalidRangeException(`max_rent_days must be at least min_rent_days (${minDays})`);
    }
}

@Injectable()
export class CarsService {
    private readonly logger = new Logger(CarsService.name);

    constructor(
        private readonly carsRepository: CarsRepository,
        private readonly bookingsRepository: BookingsRepository,
        private readonly maintenanceRepository: MaintenanceRepository,
    ) { }

    /**
     * Add a car to the fleet
     */
    async create(actor: Actor, createCarDto: CreateCarDto): Promise<CarResponseDto> {
        assertCan(actor, 'fleet:manage');
        try {
            const minDays = createCarDto.min_rent_days ?? DEFAULT_MIN_RENT_DAYS;
            const maxDays = createCarDto.max_rent_days ?? DEFAULT_MAX_RENT_DAYS;
            assertRentalDayBounds(minDays, maxDays);

            const car = await this.carsRepository.create({
                make: createCarDto.make.trim(),
                model: createCarDto.model.trim(),
                year: createCarDto.year,
                color: createCarDto.color.trim(),
                mileage: createCarDto.mileage ?? 0,
                daily_rate_cents: createCarDto.daily_rate_cents,
                available_now: createCarDto.available_now ?? true,
                min_rent_days: minDays,
                max_rent_days: maxDays,
            });

            this.logger.log(`✅ Car created: ${car.id} (${car.year} ${car.make} ${car.model})`);
            return new CarResponseDto(car);
        } catch (error) {
            this.logger.error('Error creating car:', error);
            throw error;
        }
    }

    /**
     * Get car by ID
     */
    async findById(id: number): Promise<CarResponseDto> {
        return new CarResponseDto(await this.requireCar(id));
    }

    /**
     * Load a car entity or fail with NotFound
     */
    async requireCar(id: number, db?: Queryable): Promise<Car> {
        const car = await this.carsRepository.findById(id, db);
        if (!car) {
            throw new RecordNotFoundException('Car', id);
        }
        return car;
    }

    /**
     * List cars with optional filters
     */
    async findAll(filters: CarFilters = {}): Promise<CarResponseDto[]> {
        const cars = await this.carsRepository.findMany(filters);
        return cars.map(car => new CarResponseDto(car));
    }

    /**
     * Update rate, availability flag, rental-day bounds or descriptive fields
     */
    async update(actor: Actor, id: number, updateCarDto: UpdateCarDto): Promise<CarResponseDto> {
        assertCan(actor, 'fleet:manage');
        try {
            const current = await this.requireCar(id);
            assertRentalDayBounds(
                updateCarDto.min_rent_days ?? current.min_rent_days,
                updateCarDto.max_rent_days ?? current.max_rent_days,
            );

            const changes: UpdateCarData = {
                make: updateCarDto.make?.trim(),
                model: updateCarDto.model?.trim(),
                year: updateCarDto.year,
                color: updateCarDto.color?.trim(),
                mileage: updateCarDto.mileage,
                daily_rate_cents: updateCarDto.daily_rate_cents,
                available_now: updateCarDto.available_now,
                min_rent_days: updateCarDto.min_rent_days,
                max_rent_days: updateCarDto.max_rent_days,
            };

            const car = await this.carsRepository.update(id, changes);
            if (!car) {
                throw new RecordNotFoundException('Car', id);
            }

            this.logger.log(`✅ Car updated: ${id}`);
            return new CarResponseDto(car);
        } catch (error) {
            this.logger.error(`Error updating car ${id}:`, error);
            throw error;
        }
    }

    /**
     * Take a car off the market, or put it back, independently of its bookings
     */
    async setAvailability(actor: Actor, id: number, availableNow: boolean): Promise<CarResponseDto> {
        assertCan(actor, 'fleet:manage');
        const car = await this.carsRepository.update(id, { available_now: availableNow });
        if (!car) {
            throw new RecordNotFoundException('Car', id);
        }
        this.logger.log(`✅ Car ${id} available_now -> ${availableNow}`);
        return new CarResponseDto(car);
    }

    /**
     * Delete a car that no booking or maintenance window references
     */
    async delete(actor: Actor, id: number): Promise<{ deletedId: number }> {
        assertCan(actor, 'fleet:manage');
        try {
            await this.requireCar(id);

            const [bookings, windows] = await Promise.all([
                this.bookingsRepository.countByCar(id),
                this.maintenanceRepository.countByCar(id),
            ]);
            if (bookings > 0 || windows > 0) {
                throw new ConflictException(
                    `Car ${id} is referenced by ${bookings} booking(s) and ${windows} maintenance window(s)`,
                );
            }

            const deleted = await this.carsRepository.delete(id);
            if (!deleted) {
                throw new RecordNotFoundException('Car', id);
            }

            this.logger.log(`✅ Car deleted: ${id}`);
            return { deletedId: id };
        } catch (error) {
            this.logger.error(`Error deleting car ${id}:`, error);
            throw error;
        }
    }

    /**
     * One page of cars whose fleet-side constraints admit `range`, ascending by id
     */
    async candidatesFor(
        range: DateRange,
        filters: CandidateFilters,
        afterId: number,
        limit: number,
    ): Promise<Car[]> {
        const rentalDays = durationDays(range);

        if (filters.min_days !== undefined && rentalDays < filters.min_days) {
            return [];
        }
        if (filters.max_days !== undefined && rentalDays > filters.max_days) {
            return [];
        }

        return this.carsRepository.findCandidates(
            {
                rental_days: rentalDays,
                make: filters.make,
                max_daily_rate_cents: filters.max_daily_rate_cents,
            },
            afterId,
            limit,
        );
    }
}
