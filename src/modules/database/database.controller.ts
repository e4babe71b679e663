import { Controller, Get, Post, UseGuards } from '@nestjs/common';
import { PostgresService } from './postgres.service';
import { MigrationService } from './migration.service';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CurrentUser } from '../auth/current-user.decorator';
import { Public } from '../auth/public.decorator';
import { assertCan } from '../auth/capabilities';
import { Actor } from '../auth/interfaces/actor.interface';

@Controller('health')
@UseGuards(JwtAuthGuard)
export class DatabaseController {
    constructor(
        private readonly postgresService: PostgresService,
        private readonly migrationService: MigrationService,
    ) { }

    @Public()
    @Get('database')
    async checkDatabaseHealth() {
        const postgresHealthy = await this.postgresService.healthCheck();
        const migrations = await this.migrationService.getMigrationStatus().catch(() => null);

        return {
            status: postgresHealthy ? 'healthy' : 'unhealthy',
            timestamp: new Date().toISOString(),
            services: {
                postgresql: postgresHealthy ? 'healthy' : 'unhealthy',
            },
            migrations,
        };
    }

    @Public()
    @Get('migrations')
    async checkMigrations() {
        const status = await this.migrationService.getMigrationStatus();
        return {
            ...status,
            timestamp: new Date().toISOString(),
        };
    }

    @Post('migrations/run')
    async runMigrations(@CurrentUser() actor: Actor) {
        assertCan(actor, 'database:migrate');
        const applied = await this.migrationService.runMigrations();
        return {
            success: true,
            applied,
            timestamp: new Date().toISOString(),
        };
    }
}
