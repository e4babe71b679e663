import { IsOptional, IsString, MaxLength } from 'class-validator';

export class RejectBookingDto {
    @IsOptional()
    @IsString()
    @MaxLength(1000)
    note?: string;
}
