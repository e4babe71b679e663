import { Injectable } from '@nestjs/common';
import { QueryResultRow } from 'pg';
import { PostgresService } from '../postgres.service';
import { Queryable } from '../interfaces/queryable.interface';
import {
    CreateMaintenanceWindowData,
    MaintenanceFilters,
    MaintenanceWindow,
} from '../entities/maintenance-window.entity';
import { DateRange } from '../../../common/date-range';
import { BasePostgresRepository } from './base-postgres.repository';
import { MaintenanceRepository } from './maintenance.repository';

@Injectable()
export class MaintenancePostgresRepository
    extends BasePostgresRepository<MaintenanceWindow>
    implements MaintenanceRepository {
    protected readonly tableName = 'maintenance';
    protected readonly idColumn = 'maint_id';

    constructor(postgresService: PostgresService) {
        super(postgresService);
    }

    async findMany(filters: MaintenanceFilters = {}): Promise<MaintenanceWindow[]> {
        try {
            let query = 'SELECT * FROM maintenance WHERE 1=1';
            const values: unknown[] = [];
            let paramIndex = 1;

            if (filters.car_id !== undefined) {
                query += ` AND car_id = $${paramIndex++}`;
                values.push(filters.car_id);
            }

            if (filters.state === 'open') {
                query += ' AND end_date IS NULL';
            } else if (filters.state === 'closed') {
                query += ' AND end_date IS NOT NULL';
            }

            query += filters.sort === 'start_asc'
                ? ' ORDER BY start_date ASC, maint_id'
                : ' ORDER BY start_date DESC, maint_id';

            return await this.findAll(query, values);
        } catch (error) {
            this.logger.error('Error finding maintenance windows:', error);
            throw error;
        }
    }

    async findOverlapping(carId: number, range: DateRange, db?: Queryable): Promise<MaintenanceWindow[]> {
        try {
            const query = `
                SELECT * FROM maintenance
                WHERE car_id = $1
                AND start_date < $3
                AND (end_date IS NULL OR end_date >= $2)
                ORDER BY start_date, maint_id
            `;
            return await this.findAll(query, [carId, range.start, range.end], db);
        } catch (error) {
            this.logger.error(`Error finding maintenance windows for car ${carId}:`, error);
            throw error;
        }
    }

    async create(data: CreateMaintenanceWindowData, db?: Queryable): Promise<MaintenanceWindow> {
        try {
            const query = `
                INSERT INTO maintenance (car_id, type, cost_cents, start_date, end_date, notes)
                VALUES ($1, $2, $3, $4, $5, $6)
                RETURNING *
            `;
            const values = [
                data.car_id,
                data.type,
                data.cost_cents ?? 0,
                data.start_date,
                data.end_date ?? null,
                data.notes ?? null,
            ];
            const result = await this.query(query, values, db);
            return this.mapRow(result.rows[0]);
        } catch (error) {
            this.logger.error(`Error opening maintenance for car ${data.car_id}:`, error);
            throw error;
        }
    }

    async close(id: number, endDate: string, notes?: string | null, db?: Queryable): Promise<MaintenanceWindow | null> {
        try {
            const query = `
                UPDATE maintenance
                SET end_date = $2, notes = COALESCE($3, notes)
                WHERE maint_id = $1
                RETURNING *
            `;
            return await this.findOne(query, [id, endDate, notes ?? null], db);
        } catch (error) {
            this.logger.error(`Error closing maintenance ${id}:`, error);
            throw error;
        }
    }

    async countByCar(carId: number): Promise<number> {
        try {
            const result = await this.query('SELECT COUNT(*) AS total FROM maintenance WHERE car_id = $1', [carId]);
            return parseInt(result.rows[0].total, 10);
        } catch (error) {
            this.logger.error(`Error counting maintenance windows for car ${carId}:`, error);
            throw error;
        }
    }

    protected mapRow(row: QueryResultRow): MaintenanceWindow {
        return {
            id: Number(row.maint_id),
            car_id: Number(row.car_id),
            type: row.type,
            cost_cents: Number(row.cost_cents),
            start_date: row.start_date,
            end_date: row.end_date ?? null,
            notes: row.notes ?? null,
            created_at: this.timestamp(row.created_at),
        };
    }
}
