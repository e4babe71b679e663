import { BaseRepository } from '../interfaces/base-repository.interface';
import { Queryable } from '../interfaces/queryable.interface';
import {
    CreateMaintenanceWindowData,
    MaintenanceFilters,
    MaintenanceWindow,
} from '../entities/maintenance-window.entity';
import { DateRange } from '../../../common/date-range';

export abstract class MaintenanceRepository implements BaseRepository<MaintenanceWindow, CreateMaintenanceWindowData> {
    abstract findById(id: number, db?: Queryable): Promise<MaintenanceWindow | null>;
    abstract findMany(filters?: MaintenanceFilters): Promise<MaintenanceWindow[]>;
    /** Windows of `carId` that are open or end on/after `range.start`, and start before `range.end`. */
    abstract findOverlapping(carId: number, range: DateRange, db?: Queryable): Promise<MaintenanceWindow[]>;
    abstract create(data: CreateMaintenanceWindowData, db?: Queryable): Promise<MaintenanceWindow>;
    abstract close(id: number, endDate: string, notes?: string | null, db?: Queryable): Promise<MaintenanceWindow | null>;
    abstract countByCar(carId: number): Promise<number>;
}
