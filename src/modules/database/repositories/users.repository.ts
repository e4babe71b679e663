import { BaseRepository } from '../interfaces/base-repository.interface';
import { Queryable } from '../interfaces/queryable.interface';
import { CreateUserData, User, UserRole } from '../entities/user.entity';

export abstract class UsersRepository implements BaseRepository<User, CreateUserData> {
    abstract findById(id: number, db?: Queryable): Promise<User | null>;
    abstract findByEmail(email: string): Promise<User | null>;
    abstract findMany(role?: UserRole): Promise<User[]>;
    abstract create(data: CreateUserData, db?: Queryable): Promise<User>;
}
