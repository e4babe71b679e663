import { Booking, BookingStatus } from '../database/entities/booking.entity';
import { InvalidBookingStateException } from '../../common/errors/rental.errors';

const TRANSITIONS: Readonly<Record<BookingStatus, readonly BookingStatus[]>> = {
    pending: ['approved', 'rejected'],
    approved: [],
    rejected: [],
};

export function canTransition(from: BookingStatus, to: BookingStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

export function assertTransition(booking: Pick<Booking, 'id' | 'status'>, to: BookingStatus): void {
    if (!canTransition(booking.status, to)) {
        throw new InvalidBookingStateException(
            `Booking ${booking.id} is ${booking.status}; only pending bookings can be ${to}`,
        );
    }
}
