import { Body, Controller, Get, Post, Query, UseGuards } from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CurrentUser } from '../auth/current-user.decorator';
import { Actor } from '../auth/interfaces/actor.interface';
import { UsersService } from './users.service';
import { CreateUserDto } from './dto/create-user.dto';
import { UserResponseDto } from './dto/user-response.dto';

@Controller('api/users')
@UseGuards(JwtAuthGuard)
export class UsersController {
    constructor(private readonly usersService: UsersService) { }

    @Get('me')
    async getProfile(@CurrentUser() actor: Actor): Promise<UserResponseDto> {
        return this.usersService.findById(actor.id);
    }

    @Get()
    async getUsers(
        @CurrentUser() actor: Actor,
        @Query('role') role?: string,
    ): Promise<UserResponseDto[]> {
        return this.usersService.findAll(actor, role);
    }

    @Post()
    async createUser(
        @CurrentUser() actor: Actor,
        @Body() createUserDto: CreateUserDto,
    ): Promise<UserResponseDto> {
        return this.usersService.create(actor, createUserDto);
    }
}
