import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { BookingsRepository } from '../database/repositories/bookings.repository';
import { BookingChargesRepository } from '../database/repositories/booking-charges.repository';
import { CarsRepository } from '../database/repositories/cars.repository';
import { UsersRepository } from '../database/repositories/users.repository';
import { TransactionManager } from '../database/interfaces/transaction-manager.interface';
import { Queryable } from '../database/interfaces/queryable.interface';
import { Booking, BookingFilters } from '../database/entities/booking.entity';
import { BookingCharge } from '../database/entities/booking-charge.entity';
import { Car } from '../database/entities/car.entity';
import { createDateRange, durationDays } from '../../common/date-range';
import { INT4_MAX } from '../../common/limits';
import {
    BookingConflictException,
    InvalidBookingStateException,
    InvalidRangeException,
    RecordNotFoundException,
    VehicleUnavailableException,
} from '../../common/errors/rental.errors';
import { Actor } from '../auth/interfaces/actor.interface';
import { assertCan, can } from '../auth/capabilities';
import { AvailabilityService } from '../availability/availability.service';
import { assertTransition } from './booking-status';
import { computeTotalFee } from './booking-fee';
import { ChargeDto, CreateBookingDto } from './dto/create-booking.dto';
import { BookingCreatedDto, BookingChargeResponseDto, BookingResponseDto } from './dto/booking-response.dto';

function assertWithinRentalPolicy(car: Car, rentalDays: number): void {
    if (rentalDays < car.min_rent_days) {
        throw new InvalidRangeException(
            `Car ${car.id} must be rented for at least ${car.min_rent_days} day(s); requested ${rentalDays}`,
        );
    }
    if (rentalDays > car.max_rent_days) {
        throw new InvalidRangeException(
            `Car ${car.id} can be rented for at most ${car.max_rent_days} day(s); requested ${rentalDays}`,
        );
    }
}

function assertStorableTotal(bookingId: number | null, total: number): void {
    const subject = bookingId === null ? 'Booking' : `Booking ${bookingId}`;
    if (total < 0) {
        throw new BadRequestException(`${subject} total would be negative (${total} cents)`);
    }
    if (total > INT4_MAX) {
        throw new BadRequestException(`${subject} total would exceed ${INT4_MAX} cents`);
    }
}

/**
 * The booking ledger. Creation is optimistic: a pending booking may overlap
 * anything. Approval is where conflicts are enforced, under a lock on the car
 * row so two approvals for the same car never interleave.
 */
@Injectable()
export class BookingsService {
    private readonly logger = new Logger(BookingsService.name);

    constructor(
        private readonly bookingsRepository: BookingsRepository,
        private readonly chargesRepository: BookingChargesRepository,
        private readonly carsRepository: CarsRepository,
        private readonly usersRepository: UsersRepository,
        private readonly availabilityService: AvailabilityService,
        private readonly transactionManager: TransactionManager,
    ) { }

    /**
     * Record a pending booking and report whether its dates are currently free
     */
    async create(actor: Actor, createBookingDto: CreateBookingDto): Promise<BookingCreatedDto> {
        assertCan(actor, 'booking:create');
        const userId = createBookingDto.user_id ?? actor.id;
        if (userId !== actor.id) {
            assertCan(actor, 'booking:create-on-behalf');
        }
        const extras = createBookingDto.extras ?? [];
        // Extras move the price, so they take the same right as adding a charge later
        if (extras.length > 0) {
            assertCan(actor, 'booking:charge');
        }

        const range = createDateRange(createBookingDto.start_date, createBookingDto.end_date);
        const rentalDays = durationDays(range);

        try {
            const { booking, charges } = await this.transactionManager.transaction(async (db) => {
                const user = await this.usersRepository.findById(userId, db);
                if (!user) {
                    throw new RecordNotFoundException('User', userId);
                }

                const car = await this.carsRepository.findById(createBookingDto.car_id, db);
                if (!car) {
                    throw new RecordNotFoundException('Car', createBookingDto.car_id);
                }
                if (!car.available_now) {
                    throw new VehicleUnavailableException(car.id);
                }
                assertWithinRentalPolicy(car, rentalDays);

                const totalFeeCents = computeTotalFee(rentalDays, car.daily_rate_cents, extras);
                assertStorableTotal(null, totalFeeCents);

                const created = await this.bookingsRepository.create({
                    user_id: userId,
                    car_id: car.id,
                    start_date: range.start,
                    end_date: range.end,
                    rental_days: rentalDays,
                    daily_rate_cents: car.daily_rate_cents,
                    total_fee_cents: totalFeeCents,
                }, db);

                const createdCharges = await this.insertCharges(created.id, extras, db);
                return { booking: created, charges: createdCharges };
            });

            const conflicts = await this.availabilityService.findConflicts(booking.car_id, range);
            if (conflicts.length > 0) {
                this.logger.warn(
                    `⚠️ Booking ${booking.id} created over ${conflicts.length} existing conflict(s) on car ${booking.car_id}`,
                );
            }

            this.logger.log(
                `✅ Booking created: ${booking.id} (car ${booking.car_id}, ${booking.start_date} -> ${booking.end_date})`,
            );
            return new BookingCreatedDto(booking, charges, conflicts);
        } catch (error) {
            this.logger.error('Error creating booking:', error);
            throw error;
        }
    }

    /**
     * Approve a pending booking if nothing approved or in maintenance overlaps it
     */
    async approve(actor: Actor, id: number): Promise<BookingResponseDto> {
        assertCan(actor, 'booking:decide');
        try {
            const booking = await this.transactionManager.transaction(async (db) => {
                const current = await this.bookingsRepository.findById(id, db);
                if (!current) {
                    throw new RecordNotFoundException('Booking', id);
                }

                // Car before booking, always, so approvals queue rather than deadlock
                await this.carsRepository.findByIdForUpdate(current.car_id, db);
                const locked = await this.bookingsRepository.findByIdForUpdate(id, db);
                if (!locked) {
                    throw new RecordNotFoundException('Booking', id);
                }
                assertTransition(locked, 'approved');

                const conflicts = await this.availabilityService.findConflicts(
                    locked.car_id,
                    { start: locked.start_date, end: locked.end_date },
                    { excludeBookingId: locked.id, db },
                );
                if (conflicts.length > 0) {
                    throw new BookingConflictException(locked.id, conflicts);
                }

                const approved = await this.bookingsRepository.decide(
                    locked.id,
                    { status: 'approved', decided_by: actor.id },
                    db,
                );
                if (!approved) {
                    throw new InvalidBookingStateException(`Booking ${id} is no longer pending`);
                }
                return approved;
            });

            this.logger.log(`✅ Booking approved: ${booking.id} by user ${actor.id}`);
            return new BookingResponseDto(booking);
        } catch (error) {
            if (error instanceof BookingConflictException || error instanceof InvalidBookingStateException) {
                this.logger.warn(`⚠️ Booking ${id} not approved: ${error.message}`);
            } else {
                this.logger.error(`Error approving booking ${id}:`, error);
            }
            throw error;
        }
    }

    /**
     * Reject a pending booking
     */
    async reject(actor: Actor, id: number, note?: string): Promise<BookingResponseDto> {
        assertCan(actor, 'booking:decide');
        try {
            const booking = await this.transactionManager.transaction(async (db) => {
                const locked = await this.bookingsRepository.findByIdForUpdate(id, db);
                if (!locked) {
                    throw new RecordNotFoundException('Booking', id);
                }
                assertTransition(locked, 'rejected');

                const rejected = await this.bookingsRepository.decide(
                    locked.id,
                    { status: 'rejected', decided_by: actor.id, decision_note: note?.trim() || null },
                    db,
                );
                if (!rejected) {
                    throw new InvalidBookingStateException(`Booking ${id} is no longer pending`);
                }
                return rejected;
            });

            this.logger.log(`✅ Booking rejected: ${booking.id} by user ${actor.id}`);
            return new BookingResponseDto(booking);
        } catch (error) {
            this.logger.error(`Error rejecting booking ${id}:`, error);
            throw error;
        }
    }

    /**
     * Attach an extra charge and fold it into the booking total
     */
    async addCharge(actor: Actor, id: number, charge: ChargeDto): Promise<BookingResponseDto> {
        assertCan(actor, 'booking:charge');
        try {
            const { booking, charges } = await this.transactionManager.transaction(async (db) => {
                const locked = await this.lockBooking(id, db);
                await this.insertCharges(locked.id, [charge], db);
                return this.refreshTotal(locked, db);
            });

            this.logger.log(`✅ Charge ${charge.code} (${charge.amount_cents}) added to booking ${id}`);
            return new BookingResponseDto(booking, charges);
        } catch (error) {
            this.logger.error(`Error adding charge to booking ${id}:`, error);
            throw error;
        }
    }

    /**
     * Rebuild total_fee_cents from rental days, the locked-in rate and the charges
     */
    async recalculate(actor: Actor, id: number): Promise<BookingResponseDto> {
        assertCan(actor, 'booking:charge');
        const { booking, charges } = await this.transactionManager.transaction(async (db) => {
            const locked = await this.lockBooking(id, db);
            return this.refreshTotal(locked, db);
        });
        this.logger.log(`🔄 Booking ${id} total recalculated: ${booking.total_fee_cents}`);
        return new BookingResponseDto(booking, charges);
    }

    /**
     * Get a booking; customers only see their own
     */
    async findById(actor: Actor, id: number): Promise<BookingResponseDto> {
        const booking = await this.requireVisible(actor, id);
        const charges = await this.chargesRepository.findByBooking(booking.id);
        return new BookingResponseDto(booking, charges);
    }

    /**
     * List bookings; customers are always scoped to their own
     */
    async findAll(actor: Actor, filters: BookingFilters = {}): Promise<BookingResponseDto[]> {
        assertCan(actor, 'booking:read-own');
        const scoped: BookingFilters = can(actor, 'booking:read-all')
            ? filters
            : { ...filters, user_id: actor.id };
        const bookings = await this.bookingsRepository.findMany(scoped);
        return bookings.map(booking => new BookingResponseDto(booking));
    }

    /**
     * The approval queue, oldest first
     */
    async listPending(actor: Actor): Promise<BookingResponseDto[]> {
        assertCan(actor, 'booking:read-all');
        const bookings = await this.bookingsRepository.findMany({ status: 'pending' });
        return bookings
            .sort((a, b) => a.created_at.localeCompare(b.created_at) || a.id - b.id)
            .map(booking => new BookingResponseDto(booking));
    }

    async chargesFor(actor: Actor, id: number): Promise<BookingChargeResponseDto[]> {
        const booking = await this.requireVisible(actor, id);
        const charges = await this.chargesRepository.findByBooking(booking.id);
        return charges.map(charge => new BookingChargeResponseDto(charge));
    }

    private async requireVisible(actor: Actor, id: number): Promise<Booking> {
        assertCan(actor, 'booking:read-own');
        const booking = await this.bookingsRepository.findById(id);
        // Someone else's booking reads as missing rather than forbidden
        if (!booking || (booking.user_id !== actor.id && !can(actor, 'booking:read-all'))) {
            throw new RecordNotFoundException('Booking', id);
        }
        return booking;
    }

    private async lockBooking(id: number, db: Queryable): Promise<Booking> {
        const booking = await this.bookingsRepository.findByIdForUpdate(id, db);
        if (!booking) {
            throw new RecordNotFoundException('Booking', id);
        }
        return booking;
    }

    private async insertCharges(bookingId: number, charges: readonly ChargeDto[], db: Queryable): Promise<BookingCharge[]> {
        const created: BookingCharge[] = [];
        for (const charge of charges) {
            created.push(await this.chargesRepository.create({
                booking_id: bookingId,
                code: charge.code.trim(),
                amount_cents: charge.amount_cents,
            }, db));
        }
        return created;
    }

    private async refreshTotal(
        booking: Booking,
        db: Queryable,
    ): Promise<{ booking: Booking; charges: BookingCharge[] }> {
        const charges = await this.chargesRepository.findByBooking(booking.id, db);
        const total = computeTotalFee(booking.rental_days, booking.daily_rate_cents, charges);
        assertStorableTotal(booking.id, total);

        const updated = await this.bookingsRepository.updateTotalFee(booking.id, total, db);
        if (!updated) {
            throw new RecordNotFoundException('Booking', booking.id);
        }
        return { booking: updated, charges };
    }
}
