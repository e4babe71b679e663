import { Module, Global } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PostgresService } from './postgres.service';
import { MigrationService } from './migration.service';
import { DatabaseController } from './database.controller';
import { TransactionManager } from './interfaces/transaction-manager.interface';
import {
    UsersRepository,
    CarsRepository,
    BookingsRepository,
    BookingChargesRepository,
    MaintenanceRepository,
    UsersPostgresRepository,
    CarsPostgresRepository,
    BookingsPostgresRepository,
    BookingChargesPostgresRepository,
    MaintenancePostgresRepository,
} from './repositories';

@Global()
@Module({
    imports: [ConfigModule],
    controllers: [DatabaseController],
    providers: [
        PostgresService,
        MigrationService,
        { provide: TransactionManager, useExisting: PostgresService },
        // Repository contracts are the injection tokens; PostgreSQL backs all of them
        { provide: UsersRepository, useClass: UsersPostgresRepository },
        { provide: CarsRepository, useClass: CarsPostgresRepository },
        { provide: BookingsRepository, useClass: BookingsPostgresRepository },
        { provide: BookingChargesRepository, useClass: BookingChargesPostgresRepository },
        { provide: MaintenanceRepository, useClass: MaintenancePostgresRepository },
    ],
    exports: [
        PostgresService,
        MigrationService,
        TransactionManager,
        UsersRepository,
        CarsRepository,
        BookingsRepository,
        BookingChargesRepository,
        MaintenanceRepository,
    ],
})
export class DatabaseModule { }
