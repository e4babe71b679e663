import {
    Body,
    Controller,
    Delete,
    Get,
    HttpException,
    HttpStatus,
    Logger,
    Param,
    ParseIntPipe,
    Post,
    Put,
    Query,
    UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CurrentUser } from '../auth/current-user.decorator';
import { Actor } from '../auth/interfaces/actor.interface';
import { assertCan } from '../auth/capabilities';
import { CarsService } from './cars.service';
import { CreateCarDto } from './dto/create-car.dto';
import { SetAvailabilityDto, UpdateCarDto } from './dto/update-car.dto';
import { CarResponseDto } from './dto/car-response.dto';

@Controller('api/cars')
@UseGuards(JwtAuthGuard)
export class CarsController {
    private readonly logger = new Logger(CarsController.name);

    constructor(private readonly carsService: CarsService) { }

    /**
     * List the fleet
     */
    @Get()
    async getCars(
        @CurrentUser() actor: Actor,
        @Query('make') make?: string,
        @Query('available_now') availableNow?: string,
    ): Promise<CarResponseDto[]> {
        assertCan(actor, 'fleet:read');
        return this.carsService.findAll({
            make: make?.trim() || undefined,
            available_now: availableNow === undefined ? undefined : availableNow === 'true',
        });
    }

    /**
     * Get car by ID
     */
    @Get(':id')
    async getCarById(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
    ): Promise<CarResponseDto> {
        assertCan(actor, 'fleet:read');
        return this.carsService.findById(id);
    }

    /**
     * Add a car
     */
    @Post()
    async createCar(
        @CurrentUser() actor: Actor,
        @Body() createCarDto: CreateCarDto,
    ): Promise<CarResponseDto> {
        try {
            return await this.carsService.create(actor, createCarDto);
        } catch (error) {
            this.logger.error('Error creating car:', error);
            if (error instanceof HttpException) {
                throw error;
            }
            throw new HttpException('Failed to create car', HttpStatus.INTERNAL_SERVER_ERROR);
        }
    }

    /**
     * Update a car
     */
    @Put(':id')
    async updateCar(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
        @Body() updateCarDto: UpdateCarDto,
    ): Promise<CarResponseDto> {
        try {
            return await this.carsService.update(actor, id, updateCarDto);
        } catch (error) {
            this.logger.error(`Error updating car ${id}:`, error);
            if (error instanceof HttpException) {
                throw error;
            }
            throw new HttpException('Failed to update car', HttpStatus.INTERNAL_SERVER_ERROR);
        }
    }

    /**
     * Flag a car on or off the market
     */
    @Put(':id/availability')
    async setAvailability(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
        @Body() body: SetAvailabilityDto,
    ): Promise<CarResponseDto> {
        return this.carsService.setAvailability(actor, id, body.available_now);
    }

    /**
     * Delete a car with no bookings or maintenance history
     */
    @Delete(':id')
    async deleteCar(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
    ): Promise<{ deletedId: number }> {
        try {
            return await this.carsService.delete(actor, id);
        } catch (error) {
            this.logger.error(`Error deleting car ${id}:`, error);
            if (error instanceof HttpException) {
                throw error;
            }
            throw new HttpException('Failed to delete car', HttpStatus.INTERNAL_SERVER_ERROR);
        }
    }
}
