import {
    BadRequestException,
    ConflictException,
    HttpStatus,
    NotFoundException,
    UnprocessableEntityException,
} from '@nestjs/common';

export type RentalErrorCode =
    | 'NOT_FOUND'
    | 'INVALID_RANGE'
    | 'VEHICLE_UNAVAILABLE'
    | 'INVALID_STATE'
    | 'CONFLICT';

/**
 * Something already holding the vehicle for part of a requested range.
 * `end_date` is exclusive for bookings and inclusive (or null, open) for maintenance.
 */
export interface ConflictDetail {
    kind: 'booking' | 'maintenance';
    id: number;
    start_date: string;
    end_date: string | null;
}

function errorBody(status: HttpStatus, error: string, code: RentalErrorCode, message: string) {
    return { statusCode: status, error, code, message };
}

export class RecordNotFoundException extends NotFoundException {
    readonly code: RentalErrorCode = 'NOT_FOUND';

    constructor(entity: string, id: number | string) {
        super(errorBody(HttpStatus.NOT_FOUND, 'Not Found', 'NOT_FOUND', `${entity} ${id} not found`));
    }
}

export class InvalidRangeException extends BadRequestException {
    readonly code: RentalErrorCode = 'INVALID_RANGE';

    constructor(message: string) {
        super(errorBody(HttpStatus.BAD_REQUEST, 'Bad Request', 'INVALID_RANGE', message));
    }
}

export class VehicleUnavailableException extends UnprocessableEntityException {
    readonly code: RentalErrorCode = 'VEHICLE_UNAVAILABLE';

    constructor(carId: number) {
        super(errorBody(
            HttpStatus.UNPROCESSABLE_ENTITY,
            'Unprocessable Entity',
            'VEHICLE_UNAVAILABLE',
            `Car ${carId} is not available for booking`,
        ));
    }
}

export class InvalidBookingStateException extends ConflictException {
    readonly code: RentalErrorCode = 'INVALID_STATE';

    constructor(message: string) {
        super(errorBody(HttpStatus.CONFLICT, 'Conflict', 'INVALID_STATE', message));
    }
}

export class BookingConflictException extends ConflictException {
    readonly code: RentalErrorCode = 'CONFLICT';

    constructor(bookingId: number, readonly conflicts: ConflictDetail[]) {
        super({
            ...errorBody(
                HttpStatus.CONFLICT,
                'Conflict',
                'CONFLICT',
                `Booking ${bookingId} overlaps ${conflicts.length} approved booking(s) or maintenance window(s)`,
            ),
            conflicts,
        });
    }
}
