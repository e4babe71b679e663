import { MaintenanceWindow } from '../../database/entities/maintenance-window.entity';
import { Booking } from '../../database/entities/booking.entity';

export class MaintenanceResponseDto {
    id: number;
    car_id: number;
    type: string;
    cost_cents: number;
    start_date: string;
    end_date: string | null;
    is_open: boolean;
    notes: string | null;
    created_at: string;

    constructor(window: MaintenanceWindow) {
        this.id = window.id;
        this.car_id = window.car_id;
        this.type = window.type;
        this.cost_cents = window.cost_cents;
        this.start_date = window.start_date;
        this.end_date = window.end_date;
        this.is_open = window.end_date === null;
        this.notes = window.notes;
        this.created_at = window.created_at;
    }
}

export interface MaintenanceWarning {
    booking_id: number;
    user_id: number;
    start_date: string;
    end_date: string;
}

/** An opened or closed window, with the approved bookings it now overlaps. */
export class MaintenanceWithWarningsDto extends MaintenanceResponseDto {
    warnings: MaintenanceWarning[];

    constructor(window: MaintenanceWindow, overlapping: Booking[]) {
        super(window);
        this.warnings = overlapping.map(booking => ({
            booking_id: booking.id,
            user_id: booking.user_id,
            start_date: booking.start_date,
            end_date: booking.end_date,
        }));
    }
}
