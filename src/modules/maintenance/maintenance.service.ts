import { Injectable, Logger } from '@nestjs/common';
import { MaintenanceRepository } from '../database/repositories/maintenance.repository';
import { BookingsRepository } from '../database/repositories/bookings.repository';
import { CarsRepository } from '../database/repositories/cars.repository';
import { TransactionManager } from '../database/interfaces/transaction-manager.interface';
import { Queryable } from '../database/interfaces/queryable.interface';
import { Booking } from '../database/entities/booking.entity';
import { MaintenanceFilters, MaintenanceWindow } from '../database/entities/maintenance-window.entity';
import {
    DateRange,
    overlaps,
    parseCalendarDate,
    today,
    windowAsRange,
    windowOverlaps,
} from '../../common/date-range';
import { InvalidRangeException, RecordNotFoundException } from '../../common/errors/rental.errors';
import { Actor } from '../auth/interfaces/actor.interface';
import { assertCan } from '../auth/capabilities';
import { CloseMaintenanceDto, OpenMaintenanceDto } from './dto/open-maintenance.dto';
import { MaintenanceResponseDto, MaintenanceWithWarningsDto } from './dto/maintenance-response.dto';

function assertEndNotBeforeStart(startDate: string, endDate: string): void {
    if (endDate < startDate) {
        throw new InvalidRangeException(`end_date ${endDate} must not be before start_date ${startDate}`);
    }
}

/**
 * Maintenance windows. Opening and closing hold the car row lock that booking
 * approval takes, so a window and an approval for the same car never pass
 * each other unseen.
 */
@Injectable()
export class MaintenanceService {
    private readonly logger = new Logger(MaintenanceService.name);

    constructor(
        private readonly maintenanceRepository: MaintenanceRepository,
        private readonly bookingsRepository: BookingsRepository,
        private readonly carsRepository: CarsRepository,
        private readonly transactionManager: TransactionManager,
    ) { }

    /**
     * Put a car in the shop. Approved bookings that now overlap are reported, not cancelled.
     */
    async open(actor: Actor, openMaintenanceDto: OpenMaintenanceDto): Promise<MaintenanceWithWarningsDto> {
        assertCan(actor, 'maintenance:manage');
        const startDate = parseCalendarDate(openMaintenanceDto.start_date, 'start_date');
        const endDate = openMaintenanceDto.end_date === undefined
            ? null
            : parseCalendarDate(openMaintenanceDto.end_date, 'end_date');
        if (endDate !== null) {
            assertEndNotBeforeStart(startDate, endDate);
        }

        try {
            const { window, overlapping } = await this.transactionManager.transaction(async (db) => {
                const car = await this.carsRepository.findByIdForUpdate(openMaintenanceDto.car_id, db);
                if (!car) {
                    throw new RecordNotFoundException('Car', openMaintenanceDto.car_id);
                }

                const created = await this.maintenanceRepository.create({
                    car_id: car.id,
                    type: openMaintenanceDto.type.trim(),
                    cost_cents: openMaintenanceDto.cost_cents ?? 0,
                    start_date: startDate,
                    end_date: endDate,
                    notes: openMaintenanceDto.notes?.trim() || null,
                }, db);

                return { window: created, overlapping: await this.approvedBookingsUnder(created, db) };
            });

            this.warnOverlaps(window, overlapping);
            this.logger.log(`🔧 Maintenance opened: ${window.id} on car ${window.car_id} from ${window.start_date}`);
            return new MaintenanceWithWarningsDto(window, overlapping);
        } catch (error) {
            this.logger.error('Error opening maintenance window:', error);
            throw error;
        }
    }

    /**
     * Set the last day of a window; today when no date is given. Closing again
     * moves the end date, and any approved booking the window now covers is reported.
     */
    async close(
        actor: Actor,
        id: number,
        closeMaintenanceDto: CloseMaintenanceDto = {},
    ): Promise<MaintenanceWithWarningsDto> {
        assertCan(actor, 'maintenance:manage');
        const endDate = closeMaintenanceDto.end_date === undefined
            ? today()
            : parseCalendarDate(closeMaintenanceDto.end_date, 'end_date');

        try {
            const { window, overlapping } = await this.transactionManager.transaction(async (db) => {
                const current = await this.requireWindow(id, db);
                await this.carsRepository.findByIdForUpdate(current.car_id, db);
                assertEndNotBeforeStart(current.start_date, endDate);

                const closed = await this.maintenanceRepository.close(
                    id,
                    endDate,
                    closeMaintenanceDto.notes?.trim() || null,
                    db,
                );
                if (!closed) {
                    throw new RecordNotFoundException('Maintenance window', id);
                }

                return { window: closed, overlapping: await this.approvedBookingsUnder(closed, db) };
            });

            this.warnOverlaps(window, overlapping);
            this.logger.log(`✅ Maintenance closed: ${id} (end ${endDate})`);
            return new MaintenanceWithWarningsDto(window, overlapping);
        } catch (error) {
            this.logger.error(`Error closing maintenance window ${id}:`, error);
            throw error;
        }
    }

    /**
     * Windows of the car that occupy any day of `range`
     */
    async openWindowsFor(carId: number, range: DateRange): Promise<MaintenanceWindow[]> {
        const windows = await this.maintenanceRepository.findOverlapping(carId, range);
        return windows.filter(window => windowOverlaps(window, range));
    }

    async findById(actor: Actor, id: number): Promise<MaintenanceResponseDto> {
        assertCan(actor, 'maintenance:manage');
        return new MaintenanceResponseDto(await this.requireWindow(id));
    }

    async findAll(actor: Actor, filters: MaintenanceFilters = {}): Promise<MaintenanceResponseDto[]> {
        assertCan(actor, 'maintenance:manage');
        const windows = await this.maintenanceRepository.findMany({
            car_id: filters.car_id,
            state: filters.state ?? 'all',
            sort: filters.sort ?? 'start_desc',
        });
        return windows.map(window => new MaintenanceResponseDto(window));
    }

    private async approvedBookingsUnder(window: MaintenanceWindow, db: Queryable): Promise<Booking[]> {
        const occupied = windowAsRange(window);
        const bookings = await this.bookingsRepository.findApprovedOverlapping(window.car_id, occupied, db);
        return bookings.filter(booking => overlaps({ start: booking.start_date, end: booking.end_date }, occupied));
    }

    private warnOverlaps(window: MaintenanceWindow, overlapping: Booking[]): void {
        for (const booking of overlapping) {
            this.logger.warn(
                `⚠️ Maintenance ${window.id} overlaps approved booking ${booking.id} ` +
                `(${booking.start_date} -> ${booking.end_date}) on car ${window.car_id}`,
            );
        }
    }

    private async requireWindow(id: number, db?: Queryable): Promise<MaintenanceWindow> {
        const window = await this.maintenanceRepository.findById(id, db);
        if (!window) {
            throw new RecordNotFoundException('Maintenance window', id);
        }
        return window;
    }
}
