import { Car } from '../../database/entities/car.entity';
import { CarResponseDto } from '../../cars/dto/car-response.dto';
import { computeBaseFee } from '../../bookings/booking-fee';

export class AvailableCarDto extends CarResponseDto {
    rental_days: number;
    estimated_fee_cents: number;

    constructor(car: Car, rentalDays: number) {
        super(car);
        this.rental_days = rentalDays;
        this.estimated_fee_cents = computeBaseFee(rentalDays, car.daily_rate_cents);
    }
}
