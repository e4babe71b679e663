export interface BookingCharge {
    id: number;
    booking_id: number;
    code: string;
    amount_cents: number;
    created_at: string;
}

export interface CreateBookingChargeData {
    booking_id: number;
    code: string;
    amount_cents: number;
}
