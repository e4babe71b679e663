export const USER_ROLES = ['customer', 'admin'] as const;

export type UserRole = typeof USER_ROLES[number];

export interface User {
    id: number;
    email: string;
    full_name: string;
    role: UserRole;
    created_at: string;
}

export interface CreateUserData {
    email: string;
    full_name: string;
    role: UserRole;
}
