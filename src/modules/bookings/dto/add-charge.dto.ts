import { ChargeDto } from './create-booking.dto';

/** A single extra (fuel, late return, discount as a negative amount) on an existing booking. */
export class AddChargeDto extends ChargeDto { }
