import { UserRole } from '../../database/entities/user.entity';

/** The authenticated user on whose behalf an operation runs. */
export interface Actor {
    id: number;
    role: UserRole;
    email?: string;
}
