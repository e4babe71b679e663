import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { UsersRepository } from '../database/repositories/users.repository';
import { USER_ROLES, UserRole } from '../database/entities/user.entity';
import { RecordNotFoundException } from '../../common/errors/rental.errors';
import { Actor } from '../auth/interfaces/actor.interface';
import { assertCan } from '../auth/capabilities';
import { CreateUserDto } from './dto/create-user.dto';
import { UserResponseDto } from './dto/user-response.dto';

@Injectable()
export class UsersService {
    private readonly logger = new Logger(UsersService.name);

    constructor(private readonly usersRepository: UsersRepository) { }

    /**
     * Get user by ID
     */
    async findById(id: number): Promise<UserResponseDto> {
        const user = await this.usersRepository.findById(id);
        if (!user) {
            throw new RecordNotFoundException('User', id);
        }
        return new UserResponseDto(user);
    }

    /**
     * List users, optionally by role (admin only)
     */
    async findAll(actor: Actor, role?: string): Promise<UserResponseDto[]> {
        assertCan(actor, 'users:manage');
        const roleFilter = USER_ROLES.find((candidate): candidate is UserRole => candidate === role);
        const users = await this.usersRepository.findMany(roleFilter);
        return users.map(user => new UserResponseDto(user));
    }

    /**
     * Register a user record for an identity managed elsewhere (admin only)
     */
    async create(actor: Actor, createUserDto: CreateUserDto): Promise<UserResponseDto> {
        assertCan(actor, 'users:manage');
        try {
            const email = createUserDto.email.trim().toLowerCase();
            const existing = await this.usersRepository.findByEmail(email);
            if (existing) {
                throw new ConflictException('A user with this email already exists');
            }

            const user = await this.usersRepository.create({
                email,
                full_name: createUserDto.full_name.trim(),
                role: createUserDto.role,
            });

            this.logger.log(`✅ User created: ${user.id} (${user.role})`);
            return new UserResponseDto(user);
        } catch (error) {
            this.logger.error('Error creating user:', error);
            throw error;
        }
    }
}
