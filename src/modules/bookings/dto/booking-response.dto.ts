import { Booking, BookingStatus } from '../../database/entities/booking.entity';
import { BookingCharge } from '../../database/entities/booking-charge.entity';
import { ConflictDetail } from '../../../common/errors/rental.errors';
import { computeBaseFee } from '../booking-fee';

export class BookingChargeResponseDto {
    id: number;
    code: string;
    amount_cents: number;
    created_at: string;

    constructor(charge: BookingCharge) {
        this.id = charge.id;
        this.code = charge.code;
        this.amount_cents = charge.amount_cents;
        this.created_at = charge.created_at;
    }
}

export class BookingResponseDto {
    id: number;
    user_id: number;
    car_id: number;
    start_date: string;
    end_date: string;
    rental_days: number;
    daily_rate_cents: number;
    base_fee_cents: number;
    total_fee_cents: number;
    status: BookingStatus;
    decided_by: number | null;
    decided_at: string | null;
    decision_note: string | null;
    created_at: string;
    charges?: BookingChargeResponseDto[];

    constructor(booking: Booking, charges?: BookingCharge[]) {
        this.id = booking.id;
        this.user_id = booking.user_id;
        this.car_id = booking.car_id;
        this.start_date = booking.start_date;
        this.end_date = booking.end_date;
        this.rental_days = booking.rental_days;
        this.daily_rate_cents = booking.daily_rate_cents;
        this.base_fee_cents = computeBaseFee(booking.rental_days, booking.daily_rate_cents);
        this.total_fee_cents = booking.total_fee_cents;
        this.status = booking.status;
        this.decided_by = booking.decided_by;
        this.decided_at = booking.decided_at;
        this.decision_note = booking.decision_note;
        this.created_at = booking.created_at;
        if (charges) {
            this.charges = charges.map(charge => new BookingChargeResponseDto(charge));
        }
    }
}

/** A new pending booking plus what the availability engine currently says about its dates. */
export class BookingCreatedDto extends BookingResponseDto {
    availability: {
        available: boolean;
        conflicts: ConflictDetail[];
    };

    constructor(booking: Booking, charges: BookingCharge[], conflicts: ConflictDetail[]) {
        super(booking, charges);
        this.availability = {
            available: conflicts.length === 0,
            conflicts,
        };
    }
}
