import { BaseRepository } from '../interfaces/base-repository.interface';
import { Queryable } from '../interfaces/queryable.interface';
import { Booking, BookingDecision, BookingFilters, CreateBookingData } from '../entities/booking.entity';
import { DateRange } from '../../../common/date-range';

export abstract class BookingsRepository implements BaseRepository<Booking, CreateBookingData> {
    abstract findById(id: number, db?: Queryable): Promise<Booking | null>;
    abstract findByIdForUpdate(id: number, db: Queryable): Promise<Booking | null>;
    abstract findMany(filters?: BookingFilters): Promise<Booking[]>;
    /** Approved bookings of `carId` sharing at least one day with `range`. */
    abstract findApprovedOverlapping(carId: number, range: DateRange, db?: Queryable): Promise<Booking[]>;
    /** Inserts with status `pending`. */
    abstract create(data: CreateBookingData, db?: Queryable): Promise<Booking>;
    /** Moves a pending booking to a terminal status; null if it was not pending. */
    abstract decide(id: number, decision: BookingDecision, db?: Queryable): Promise<Booking | null>;
    abstract updateTotalFee(id: number, totalFeeCents: number, db?: Queryable): Promise<Booking | null>;
    abstract countByCar(carId: number): Promise<number>;
}
