import { Queryable } from '../interfaces/queryable.interface';
import { BookingCharge, CreateBookingChargeData } from '../entities/booking-charge.entity';

export abstract class BookingChargesRepository {
    abstract findByBooking(bookingId: number, db?: Queryable): Promise<BookingCharge[]>;
    abstract create(data: CreateBookingChargeData, db?: Queryable): Promise<BookingCharge>;
}
