import { Car } from '../../database/entities/car.entity';

export class CarResponseDto {
    id: number;
    label: string;
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

    constructor(car: Car) {
        this.id = car.id;
        this.label = `${car.year} ${car.make} ${car.model}`;
        this.make = car.make;
        this.model = car.model;
        this.year = car.year;
        this.color = car.color;
        this.mileage = car.mileage;
        this.daily_rate_cents = car.daily_rate_cents;
        this.available_now = car.available_now;
        this.min_rent_days = car.min_rent_days;
        this.max_rent_days = car.max_rent_days;
        this.created_at = car.created_at;
        this.updated_at = car.updated_at;
    }
}
