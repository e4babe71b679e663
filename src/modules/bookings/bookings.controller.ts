import {
    Body,
    Controller,
    Get,
    HttpCode,
    HttpException,
    HttpStatus,
    Logger,
    Param,
    ParseIntPipe,
    Post,
    Query,
    UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CurrentUser } from '../auth/current-user.decorator';
import { Actor } from '../auth/interfaces/actor.interface';
import { BookingsService } from './bookings.service';
import { CreateBookingDto } from './dto/create-booking.dto';
import { AddChargeDto } from './dto/add-charge.dto';
import { RejectBookingDto } from './dto/decide-booking.dto';
import { BookingQueryDto } from './dto/booking-query.dto';
import { BookingChargeResponseDto, BookingCreatedDto, BookingResponseDto } from './dto/booking-response.dto';

@Controller('api/bookings')
@UseGuards(JwtAuthGuard)
export class BookingsController {
    private readonly logger = new Logger(BookingsController.name);

    constructor(private readonly bookingsService: BookingsService) { }

    @Post()
    async createBooking(
        @CurrentUser() actor: Actor,
        @Body() createBookingDto: CreateBookingDto,
    ): Promise<BookingCreatedDto> {
        try {
            return await this.bookingsService.create(actor, createBookingDto);
        } catch (error) {
            this.logger.error('Error creating booking:', error);
            if (error instanceof HttpException) {
                throw error;
            }
            throw new HttpException('Failed to create booking', HttpStatus.INTERNAL_SERVER_ERROR);
        }
    }

    @Get()
    async getBookings(
        @CurrentUser() actor: Actor,
        @Query() query: BookingQueryDto,
    ): Promise<BookingResponseDto[]> {
        return this.bookingsService.findAll(actor, {
            status: query.status,
            car_id: query.car_id,
            user_id: query.user_id,
        });
    }

    /**
     * Pending bookings awaiting a decision
     */
    @Get('pending')
    async getPendingBookings(@CurrentUser() actor: Actor): Promise<BookingResponseDto[]> {
        return this.bookingsService.listPending(actor);
    }

    @Get(':id')
    async getBookingById(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
    ): Promise<BookingResponseDto> {
        return this.bookingsService.findById(actor, id);
    }

    @Get(':id/charges')
    async getCharges(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
    ): Promise<BookingChargeResponseDto[]> {
        return this.bookingsService.chargesFor(actor, id);
    }

    @Post(':id/charges')
    async addCharge(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
        @Body() addChargeDto: AddChargeDto,
    ): Promise<BookingResponseDto> {
        return this.bookingsService.addCharge(actor, id, addChargeDto);
    }

    @Post(':id/approve')
    @HttpCode(HttpStatus.OK)
    async approveBooking(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
    ): Promise<BookingResponseDto> {
        try {
            return await this.bookingsService.approve(actor, id);
        } catch (error) {
            if (error instanceof HttpException) {
                throw error;
            }
            this.logger.error(`Error approving booking ${id}:`, error);
            throw new HttpException('Failed to approve booking', HttpStatus.INTERNAL_SERVER_ERROR);
        }
    }

    @Post(':id/reject')
    @HttpCode(HttpStatus.OK)
    async rejectBooking(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
        @Body() rejectBookingDto: RejectBookingDto,
    ): Promise<BookingResponseDto> {
        return this.bookingsService.reject(actor, id, rejectBookingDto.note);
    }

    @Post(':id/recalculate')
    @HttpCode(HttpStatus.OK)
    async recalculate(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
    ): Promise<BookingResponseDto> {
        return this.bookingsService.recalculate(actor, id);
    }
}
