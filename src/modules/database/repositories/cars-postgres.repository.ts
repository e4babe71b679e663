import { Injectable } from '@nestjs/common';
import { QueryResultRow } from 'pg';
import { PostgresService } from '../postgres.service';
import { Queryable } from '../interfaces/queryable.interface';
import { CandidateCriteria, Car, CarFilters, CreateCarData, UpdateCarData } from '../entities/car.entity';
import { BasePostgresRepository } from './base-postgres.repository';
import { CarsRepository } from './cars.repository';

@Injectable()
export class CarsPostgresRepository extends BasePostgresRepository<Car> implements CarsRepository {
    protected readonly tableName = 'cars';
    protected readonly idColumn = 'car_id';

    constructor(postgresService: PostgresService) {
        super(postgresService);
    }

    async findMany(filters: CarFilters = {}): Promise<Car[]> {
        try {
            let query = 'SELECT * FROM cars WHERE 1=1';
            const values: unknown[] = [];
            let paramCount = 0;

            if (filters.make) {
                paramCount++;
                query += ` AND LOWER(make) = LOWER($${paramCount})`;
                values.push(filters.make);
            }

            if (filters.available_now !== undefined) {
                paramCount++;
                query += ` AND available_now = $${paramCount}`;
                values.push(filters.available_now);
            }

            query += ' ORDER BY car_id';

            return await this.findAll(query, values);
        } catch (error) {
            this.logger.error('Error finding cars:', error);
            throw error;
        }
    }

    async findCandidates(criteria: CandidateCriteria, afterId: number, limit: number): Promise<Car[]> {
        try {
            let query = `
                SELECT * FROM cars
                WHERE available_now = TRUE
                AND min_rent_days <= $1 AND max_rent_days >= $1
                AND car_id > $2
            `;
            const values: unknown[] = [criteria.rental_days, afterId];
            let paramCount = 2;

            if (criteria.make) {
                paramCount++;
                query += ` AND LOWER(make) = LOWER($${paramCount})`;
                values.push(criteria.make);
            }

            if (criteria.max_daily_rate_cents !== undefined) {
                paramCount++;
                query += ` AND daily_rate_cents <= $${paramCount}`;
                values.push(criteria.max_daily_rate_cents);
            }

            paramCount++;
            query += ` ORDER BY car_id LIMIT $${paramCount}`;
            values.push(limit);

            return await this.findAll(query, values);
        } catch (error) {
            this.logger.error('Error finding candidate cars:', error);
            throw error;
        }
    }

    async create(data: CreateCarData, db?: Queryable): Promise<Car> {
        try {
            const query = `
                INSERT INTO cars (
                    make, model, year, color, mileage, daily_rate_cents,
                    available_now, min_rent_days, max_rent_days
                ) VALUES (
                    $1, $2, $3, $4, $5, $6, $7, $8, $9
                ) RETURNING *
            `;

            const values = [
                data.make,
                data.model,
                data.year,
                data.color,
                data.mileage ?? 0,
                data.daily_rate_cents,
                data.available_now ?? true,
                data.min_rent_days ?? 1,
                data.max_rent_days ?? 30,
            ];

            const result = await this.query(query, values, db);
            return this.mapRow(result.rows[0]);
        } catch (error) {
            this.logger.error('Error creating car:', error);
            throw error;
        }
    }

    async update(id: number, data: UpdateCarData): Promise<Car | null> {
        try {
            const fields: string[] = [];
            const values: unknown[] = [];
            let paramCount = 0;

            Object.entries(data).forEach(([key, value]) => {
                if (value !== undefined) {
                    paramCount++;
                    fields.push(`${key} = $${paramCount}`);
                    values.push(value);
                }
            });

            if (fields.length === 0) {
                return this.findById(id);
            }

            paramCount++;
            fields.push('updated_at = NOW()');
            values.push(id);

            const query = `
                UPDATE cars
                SET ${fields.join(', ')}
                WHERE car_id = $${paramCount}
                RETURNING *
            `;

            return await this.findOne(query, values);
        } catch (error) {
            this.logger.error(`Error updating car ${id}:`, error);
            throw error;
        }
    }

    async delete(id: number): Promise<boolean> {
        try {
            const result = await this.query('DELETE FROM cars WHERE car_id = $1', [id]);
            return (result.rowCount ?? 0) > 0;
        } catch (error) {
            this.logger.error(`Error deleting car ${id}:`, error);
            throw error;
        }
    }

    protected mapRow(row: QueryResultRow): Car {
        return {
            id: Number(row.car_id),
            make: row.make,
            model: row.model,
            year: Number(row.year),
            color: row.color,
            mileage: Number(row.mileage),
            daily_rate_cents: Number(row.daily_rate_cents),
            available_now: Boolean(row.available_now),
            min_rent_days: Number(row.min_rent_days),
            max_rent_days: Number(row.max_rent_days),
            created_at: this.timestamp(row.created_at),
            updated_at: this.timestamp(row.updated_at),
        };
    }
}
