import { Module } from '@nestjs/common';
import { AvailabilityModule } from '../availability/availability.module';
import { BookingsService } from './bookings.service';
import { BookingsController } from './bookings.controller';

@Module({
    imports: [AvailabilityModule],
    controllers: [BookingsController],
    providers: [BookingsService],
    exports: [BookingsService],
})
export class BookingsModule { }
