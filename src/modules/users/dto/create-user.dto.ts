import { IsEmail, IsIn, IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { USER_ROLES, UserRole } from '../../database/entities/user.entity';

export class CreateUserDto {
    @IsEmail()
    @MaxLength(255)
    email!: string;

    @IsString()
    @IsNotEmpty()
    @MaxLength(255)
    full_name!: string;

    @IsIn(USER_ROLES)
    role!: UserRole;
}
