import { Injectable } from '@nestjs/common';
import { QueryResultRow } from 'pg';
import { PostgresService } from '../postgres.service';
import { Queryable } from '../interfaces/queryable.interface';
import { BookingCharge, CreateBookingChargeData } from '../entities/booking-charge.entity';
import { BasePostgresRepository } from './base-postgres.repository';
import { BookingChargesRepository } from './booking-charges.repository';

@Injectable()
export class BookingChargesPostgresRepository
    extends BasePostgresRepository<BookingCharge>
    implements BookingChargesRepository {
    protected readonly tableName = 'booking_charges';
    protected readonly idColumn = 'charge_id';

    constructor(postgresService: PostgresService) {
        super(postgresService);
    }

    async findByBooking(bookingId: number, db?: Queryable): Promise<BookingCharge[]> {
        try {
            const query = 'SELECT * FROM booking_charges WHERE booking_id = $1 ORDER BY charge_id';
            return await this.findAll(query, [bookingId], db);
        } catch (error) {
            this.logger.error(`Error finding charges for booking ${bookingId}:`, error);
            throw error;
        }
    }

    async create(data: CreateBookingChargeData, db?: Queryable): Promise<BookingCharge> {
        try {
            const query = `
                INSERT INTO booking_charges (booking_id, code, amount_cents)
                VALUES ($1, $2, $3)
                RETURNING *
            `;
            const result = await this.query(query, [data.booking_id, data.code, data.amount_cents], db);
            return this.mapRow(result.rows[0]);
        } catch (error) {
            this.logger.error(`Error adding charge to booking ${data.booking_id}:`, error);
            throw error;
        }
    }

    protected mapRow(row: QueryResultRow): BookingCharge {
        return {
            id: Number(row.charge_id),
            booking_id: Number(row.booking_id),
            code: row.code,
            amount_cents: Number(row.amount_cents),
            created_at: this.timestamp(row.created_at),
        };
    }
}
