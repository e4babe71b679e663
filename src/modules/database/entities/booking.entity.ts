export const BOOKING_STATUSES = ['pending', 'approved', 'rejected'] as const;

export type BookingStatus = typeof BOOKING_STATUSES[number];

export interface Booking {
    id: number;
    user_id: number;
    car_id: number;
    start_date: string;
    end_date: string;
    rental_days: number;
    daily_rate_cents: number;
    total_fee_cents: number;
    status: BookingStatus;
    decided_by: number | null;
    decided_at: string | null;
    decision_note: string | null;
    created_at: string;
}

export interface CreateBookingData {
    user_id: number;
    car_id: number;
    start_date: string;
    end_date: string;
    rental_days: number;
    daily_rate_cents: number;
    total_fee_cents: number;
}

export interface BookingDecision {
    status: Exclude<BookingStatus, 'pending'>;
    decided_by: number;
    decision_note?: string | null;
}

export interface BookingFilters {
    user_id?: number;
    car_id?: number;
    status?: BookingStatus;
}
