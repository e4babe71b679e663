import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, QueryResult, QueryResultRow, types } from 'pg';
import { Queryable } from './interfaces/queryable.interface';
import { TransactionManager } from './interfaces/transaction-manager.interface';

// DATE columns stay as 'YYYY-MM-DD' instead of becoming local-midnight Date objects.
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

@Injectable()
export class PostgresService implements OnModuleInit, OnModuleDestroy, Queryable, TransactionManager {
    private readonly logger = new Logger(PostgresService.name);
    private pool: Pool | null = null;

    constructor(private readonly configService: ConfigService) { }

    async onModuleInit() {
        const connectionString = this.configService.get<string>('DATABASE_URL');

        if (!connectionString) {
            throw new Error('DATABASE_URL must be configured');
        }

        this.logger.log(`🔗 Connecting to PostgreSQL at ${this.redact(connectionString)}`);

        this.pool = new Pool({
            connectionString,
            ssl: this.configService.get<boolean>('DATABASE_SSL') ? { rejectUnauthorized: false } : undefined,
            max: this.configService.get<number>('DATABASE_POOL_MAX') ?? 10,
            idleTimeoutMillis: 60000,
            connectionTimeoutMillis: 20000,
        });

        this.pool.on('error', (error) => {
            this.logger.error('❌ Idle PostgreSQL client failed:', error.message);
        });

        this.logger.log('✅ PostgreSQL pool initialized successfully');

        // Test connection asynchronously to avoid blocking startup
        this.testConnection().catch((error: Error) => {
            this.logger.warn(`⚠️ PostgreSQL connection test failed during startup: ${error.message}`);
        });
    }

    async onModuleDestroy() {
        await this.close();
    }

    /**
     * Get a client from the pool
     */
    async getClient(): Promise<PoolClient> {
        if (!this.pool) {
            throw new Error('PostgreSQL pool is not initialized');
        }
        return this.pool.connect();
    }

    /**
     * Execute a query with parameters
     */
    async query(text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>> {
        let client: PoolClient | null = null;
        try {
            this.logger.debug(`🔍 Executing query: ${text.substring(0, 100)}...`);
            client = await this.getClient();
            const result = await client.query(text, params);
            this.logger.debug(`✅ Query executed successfully, rows: ${result.rowCount ?? 0}`);
            return result;
        } catch (error) {
            this.logger.error(`❌ Query failed: ${text.substring(0, 100)}...`);
            throw error;
        } finally {
            if (client) {
                client.release();
            }
        }
    }

    /**
     * Execute `callback` on a single client between BEGIN and COMMIT
     */
    async transaction<T>(callback: (db: Queryable) => Promise<T>): Promise<T> {
        const client = await this.getClient();
        const db: Queryable = {
            query: (text, values) => client.query(text, values),
        };
        try {
            await client.query('BEGIN');
            const result = await callback(db);
            await client.query('COMMIT');
            return result;
        } catch (error) {
            await client.query('ROLLBACK');
            throw error;
        } finally {
            client.release();
        }
    }

    /**
     * Health check for the database connection
     */
    async healthCheck(): Promise<boolean> {
        try {
            await this.testConnection();
            return true;
        } catch {
            return false;
        }
    }

    /**
     * Close the connection pool
     */
    async close(): Promise<void> {
        if (this.pool) {
            await this.pool.end();
            this.pool = null;
        }
    }

    private async testConnection(): Promise<void> {
        const result = await this.query('SELECT NOW() AS current_time, version() AS postgres_version');
        this.logger.log('✅ PostgreSQL connection successful');
        this.logger.log(`   PostgreSQL version: ${result.rows[0].postgres_version}`);
    }

    private redact(connectionString: string): string {
        return connectionString.replace(/\/\/([^:@/]+):[^@/]*@/, '//$1:***@');
    }
}
