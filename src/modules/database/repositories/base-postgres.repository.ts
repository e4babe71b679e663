import { Logger } from '@nestjs/common';
import { QueryResult, QueryResultRow } from 'pg';
import { PostgresService } from '../postgres.service';
import { Queryable } from '../interfaces/queryable.interface';

export abstract class BasePostgresRepository<T> {
    protected readonly logger = new Logger(this.constructor.name);
    protected abstract readonly tableName: string;
    protected abstract readonly idColumn: string;

    constructor(protected readonly postgresService: PostgresService) { }

    protected abstract mapRow(row: QueryResultRow): T;

    async findById(id: number, db?: Queryable): Promise<T | null> {
        try {
            const query = `SELECT * FROM ${this.tableName} WHERE ${this.idColumn} = $1`;
            const result = await this.query(query, [id], db);
            return result.rows.length === 0 ? null : this.mapRow(result.rows[0]);
        } catch (error) {
            this.logger.error(`Error finding ${this.tableName} by ID ${id}:`, error);
            throw error;
        }
    }

    /**
     * Same as findById, but holds a row lock until the surrounding transaction ends
     */
    async findByIdForUpdate(id: number, db: Queryable): Promise<T | null> {
        try {
            const query = `SELECT * FROM ${this.tableName} WHERE ${this.idColumn} = $1 FOR UPDATE`;
            const result = await db.query(query, [id]);
            return result.rows.length === 0 ? null : this.mapRow(result.rows[0]);
        } catch (error) {
            this.logger.error(`Error locking ${this.tableName} ${id}:`, error);
            throw error;
        }
    }

    // Helper for custom queries; runs on the transaction client when one is given
    protected async query(text: string, values: unknown[] = [], db?: Queryable): Promise<QueryResult<QueryResultRow>> {
        return (db ?? this.postgresService).query(text, values);
    }

    protected async findOne(text: string, values: unknown[], db?: Queryable): Promise<T | null> {
        const result = await this.query(text, values, db);
        return result.rows.length === 0 ? null : this.mapRow(result.rows[0]);
    }

    protected async findAll(text: string, values: unknown[] = [], db?: Queryable): Promise<T[]> {
        const result = await this.query(text, values, db);
        return result.rows.map(row => this.mapRow(row));
    }

    protected timestamp(value: unknown): string {
        return value instanceof Date ? value.toISOString() : String(value);
    }

    protected nullableTimestamp(value: unknown): string | null {
        return value === null || value === undefined ? null : this.timestamp(value);
    }
}
