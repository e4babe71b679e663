export interface Car {
    id: number;
    make: string;
    model: string;
    year: number;
    color: string;
    mileage: number;
    daily_rate_cents: number;
    available_now: boolean;
    min_rent_days: number;
    max_rent_days: number;
    created_at: string;
    updated_at: string;
}

export interface CreateCarData {
    make: string;
    model: string;
    year: number;
    color: string;
    mileage?: number;
    daily_rate_cents: number;
    available_now?: boolean;
    min_rent_days?: number;
    max_rent_days?: number;
}

export interface UpdateCarData {
    make?: string;
    model?: string;
    year?: number;
    color?: string;
    mileage?: number;
    daily_rate_cents?: number;
    available_now?: boolean;
    min_rent_days?: number;
    max_rent_days?: number;
}

export interface CarFilters {
    make?: string;
    available_now?: boolean;
}

/** Fleet-side constraints a car must meet to be offered for a range. */
export interface CandidateCriteria {
    rental_days: number;
    make?: string;
    max_daily_rate_cents?: number;
}
