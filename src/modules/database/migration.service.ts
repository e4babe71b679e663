import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PostgresService } from './postgres.service';
import * as fs from 'fs';
import * as path from 'path';

export interface MigrationStatus {
    total: number;
    executed: number;
    pending: string[];
    isUpToDate: boolean;
}

@Injectable()
export class MigrationService {
    private readonly logger = new Logger(MigrationService.name);
    private readonly migrationsPath: string;

    constructor(
        private readonly postgresService: PostgresService,
        configService: ConfigService,
    ) {
        // src/modules/database and dist/modules/database both sit three levels below the repo root
        this.migrationsPath = configService.get<string>('MIGRATIONS_DIR')
            ?? path.join(__dirname, '../../../migrations');
    }

    /**
     * Run all pending migrations
     */
    async runMigrations(): Promise<string[]> {
        try {
            this.logger.log('🚀 Starting database migrations...');

            await this.createMigrationsTable();

            const executedMigrations = await this.getExecutedMigrations();
            const pending = this.getMigrationFiles().filter(file => !executedMigrations.includes(file));

            for (const migrationFile of pending) {
                await this.runMigration(migrationFile);
            }

            this.logger.log(`✅ Database migrations completed (${pending.length} applied)`);
            return pending;
        } catch (error) {
            this.logger.error('❌ Migration failed:', error);
            throw error;
        }
    }

    /**
     * Get migration status
     */
    async getMigrationStatus(): Promise<MigrationStatus> {
        const migrationFiles = this.getMigrationFiles();
        const executedMigrations = await this.getExecutedMigrations();
        const pending = migrationFiles.filter(file => !executedMigrations.includes(file));

        return {
            total: migrationFiles.length,
            executed: executedMigrations.length,
            pending,
            isUpToDate: pending.length === 0,
        };
    }

    private async createMigrationsTable(): Promise<void> {
        await this.postgresService.query(`
            CREATE TABLE IF NOT EXISTS public.migrations (
                id SERIAL PRIMARY KEY,
                filename VARCHAR(255) NOT NULL UNIQUE,
                executed_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
            )
        `);
    }

    private getMigrationFiles(): string[] {
        if (!fs.existsSync(this.migrationsPath)) {
            this.logger.warn(`Migrations directory does not exist: ${this.migrationsPath}`);
            return [];
        }

        return fs.readdirSync(this.migrationsPath)
            .filter(file => file.endsWith('.sql'))
            .sort();
    }

    private async getExecutedMigrations(): Promise<string[]> {
        try {
            const result = await this.postgresService.query(
                'SELECT filename FROM public.migrations ORDER BY executed_at'
            );
            return result.rows.map(row => String(row.filename));
        } catch (error) {
            // The tracking table does not exist before the first run.
            this.logger.warn('Could not fetch executed migrations:', error);
            return [];
        }
    }

    private async runMigration(filename: string): Promise<void> {
        this.logger.log(`📄 Running migration: ${filename}`);

        const migrationSQL = fs.readFileSync(path.join(this.migrationsPath, filename), 'utf8');

        await this.postgresService.transaction(async (db) => {
            await db.query(migrationSQL);
            await db.query('INSERT INTO public.migrations (filename) VALUES ($1)', [filename]);
        });

        this.logger.log(`✅ Migration completed: ${filename}`);
    }
}
