import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Min } from 'class-validator';
import { MaintenanceState } from '../../database/entities/maintenance-window.entity';

export class MaintenanceQueryDto {
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    car_id?: number;

    @IsOptional()
    @IsIn(['open', 'closed', 'all'])
    state?: MaintenanceState;

    @IsOptional()
    @IsIn(['start_asc', 'start_desc'])
    sort?: 'start_asc' | 'start_desc';
}
