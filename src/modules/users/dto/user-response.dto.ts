import { User, UserRole } from '../../database/entities/user.entity';

export class UserResponseDto {
    id: number;
    email: string;
    full_name: string;
    role: UserRole;
    created_at: string;

    constructor(user: User) {
        this.id = user.id;
        this.email = user.email;
        this.full_name = user.full_name;
        this.role = user.role;
        this.created_at = user.created_at;
    }
}
