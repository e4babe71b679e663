import { Injectable } from '@nestjs/common';
import { QueryResultRow } from 'pg';
import { PostgresService } from '../postgres.service';
import { Queryable } from '../interfaces/queryable.interface';
import { Booking, BookingDecision, BookingFilters, CreateBookingData } from '../entities/booking.entity';
import { DateRange } from '../../../common/date-range';
import { BasePostgresRepository } from './base-postgres.repository';
import { BookingsRepository } from './bookings.repository';

@Injectable()
export class BookingsPostgresRepository extends BasePostgresRepository<Booking> implements BookingsRepository {
    protected readonly tableName = 'bookings';
    protected readonly idColumn = 'booking_id';

    constructor(postgresService: PostgresService) {
        super(postgresService);
    }

    async findMany(filters: BookingFilters = {}): Promise<Booking[]> {
        try {
            let query = 'SELECT * FROM bookings WHERE 1=1';
            const values: unknown[] = [];
            let paramIndex = 1;

            if (filters.user_id !== undefined) {
                query += ` AND user_id = $${paramIndex++}`;
                values.push(filters.user_id);
            }

            if (filters.car_id !== undefined) {
                query += ` AND car_id = $${paramIndex++}`;
                values.push(filters.car_id);
            }

            if (filters.status) {
                query += ` AND status = $${paramIndex++}`;
                values.push(filters.status);
            }

            query += ' ORDER BY booking_id';

            return await this.findAll(query, values);
        } catch (error) {
            this.logger.error('Error finding bookings:', error);
            throw error;
        }
    }

    async findApprovedOverlapping(carId: number, range: DateRange, db?: Queryable): Promise<Booking[]> {
        try {
            // Served by idx_bookings_car_dates_active
            const query = `
                SELECT * FROM bookings
                WHERE car_id = $1
                AND status = 'approved'
                AND start_date < $3
                AND end_date > $2
                ORDER BY start_date, booking_id
            `;
            return await this.findAll(query, [carId, range.start, range.end], db);
        } catch (error) {
            this.logger.error(`Error finding approved bookings for car ${carId}:`, error);
            throw error;
        }
    }

    async create(data: CreateBookingData, db?: Queryable): Promise<Booking> {
        try {
            const query = `
                INSERT INTO bookings (
                    user_id, car_id, start_date, end_date, rental_days,
                    daily_rate_cents, total_fee_cents, status
                ) VALUES (
                    $1, $2, $3, $4, $5, $6, $7, 'pending'
                ) RETURNING *
            `;

            const values = [
                data.user_id,
                data.car_id,
                data.start_date,
                data.end_date,
                data.rental_days,
                data.daily_rate_cents,
                data.total_fee_cents,
            ];

            const result = await this.query(query, values, db);
            return this.mapRow(result.rows[0]);
        } catch (error) {
            this.logger.error('Error creating booking:', error);
            throw error;
        }
    }

    async decide(id: number, decision: BookingDecision, db?: Queryable): Promise<Booking | null> {
        try {
            const query = `
                UPDATE bookings
                SET status = $2, decided_by = $3, decided_at = NOW(), decision_note = $4
                WHERE booking_id = $1 AND status = 'pending'
                RETURNING *
            `;
            return await this.findOne(
                query,
                [id, decision.status, decision.decided_by, decision.decision_note ?? null],
                db,
            );
        } catch (error) {
            this.logger.error(`Error updating booking ${id} to ${decision.status}:`, error);
            throw error;
        }
    }

    async updateTotalFee(id: number, totalFeeCents: number, db?: Queryable): Promise<Booking | null> {
        try {
            const query = 'UPDATE bookings SET total_fee_cents = $2 WHERE booking_id = $1 RETURNING *';
            return await this.findOne(query, [id, totalFeeCents], db);
        } catch (error) {
            this.logger.error(`Error updating total fee of booking ${id}:`, error);
            throw error;
        }
    }

    async countByCar(carId: number): Promise<number> {
        try {
            const result = await this.query('SELECT COUNT(*) AS total FROM bookings WHERE car_id = $1', [carId]);
            return parseInt(result.rows[0].total, 10);
        } catch (error) {
            this.logger.error(`Error counting bookings for car ${carId}:`, error);
            throw error;
        }
    }

    protected mapRow(row: QueryResultRow): Booking {
        return {
            id: Number(row.booking_id),
            user_id: Number(row.user_id),
            car_id: Number(row.car_id),
            start_date: row.start_date,
            end_date: row.end_date,
            rental_days: Number(row.rental_days),
            daily_rate_cents: Number(row.daily_rate_cents),
            total_fee_cents: Number(row.total_fee_cents),
            status: row.status,
            decided_by: row.decided_by === null ? null : Number(row.decided_by),
            decided_at: this.nullableTimestamp(row.decided_at),
            decision_note: row.decision_note ?? null,
            created_at: this.timestamp(row.created_at),
        };
    }
}
