import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post, Query, UseGuards } from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CurrentUser } from '../auth/current-user.decorator';
import { Actor } from '../auth/interfaces/actor.interface';
import { MaintenanceService } from './maintenance.service';
import { CloseMaintenanceDto, OpenMaintenanceDto } from './dto/open-maintenance.dto';
import { MaintenanceQueryDto } from './dto/maintenance-query.dto';
import { MaintenanceResponseDto, MaintenanceWithWarningsDto } from './dto/maintenance-response.dto';

@Controller('api/maintenance')
@UseGuards(JwtAuthGuard)
export class MaintenanceController {
    constructor(private readonly maintenanceService: MaintenanceService) { }

    @Get()
    async getWindows(
        @CurrentUser() actor: Actor,
        @Query() query: MaintenanceQueryDto,
    ): Promise<MaintenanceResponseDto[]> {
        return this.maintenanceService.findAll(actor, query);
    }

    @Get(':id')
    async getWindowById(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
    ): Promise<MaintenanceResponseDto> {
        return this.maintenanceService.findById(actor, id);
    }

    @Post()
    async openWindow(
        @CurrentUser() actor: Actor,
        @Body() openMaintenanceDto: OpenMaintenanceDto,
    ): Promise<MaintenanceWithWarningsDto> {
        return this.maintenanceService.open(actor, openMaintenanceDto);
    }

    @Post(':id/close')
    @HttpCode(HttpStatus.OK)
    async closeWindow(
        @CurrentUser() actor: Actor,
        @Param('id', ParseIntPipe) id: number,
        @Body() closeMaintenanceDto: CloseMaintenanceDto,
    ): Promise<MaintenanceWithWarningsDto> {
        return this.maintenanceService.close(actor, id, closeMaintenanceDto);
    }
}
