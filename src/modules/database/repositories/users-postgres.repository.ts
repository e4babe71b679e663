import { Injectable } from '@nestjs/common';
import { QueryResultRow } from 'pg';
import { PostgresService } from '../postgres.service';
import { Queryable } from '../interfaces/queryable.interface';
import { CreateUserData, User, UserRole } from '../entities/user.entity';
import { BasePostgresRepository } from './base-postgres.repository';
import { UsersRepository } from './users.repository';

@Injectable()
export class UsersPostgresRepository extends BasePostgresRepository<User> implements UsersRepository {
    protected readonly tableName = 'users';
    protected readonly idColumn = 'user_id';

    constructor(postgresService: PostgresService) {
        super(postgresService);
    }

    async findByEmail(email: string): Promise<User | null> {
        try {
            return await this.findOne('SELECT * FROM users WHERE email = $1', [email.trim().toLowerCase()]);
        } catch (error) {
            this.logger.error(`Error finding user by email ${email}:`, error);
            throw error;
        }
    }

    async findMany(role?: UserRole): Promise<User[]> {
        try {
            return role
                ? await this.findAll('SELECT * FROM users WHERE role = $1 ORDER BY user_id', [role])
                : await this.findAll('SELECT * FROM users ORDER BY user_id');
        } catch (error) {
            this.logger.error('Error finding users:', error);
            throw error;
        }
    }

    async create(data: CreateUserData, db?: Queryable): Promise<User> {
        try {
            const query = `
                INSERT INTO users (email, full_name, role)
                VALUES ($1, $2, $3)
                RETURNING *
            `;
            const result = await this.query(query, [data.email.trim().toLowerCase(), data.full_name, data.role], db);
            return this.mapRow(result.rows[0]);
        } catch (error) {
            this.logger.error('Error creating user:', error);
            throw error;
        }
    }

    protected mapRow(row: QueryResultRow): User {
        return {
            id: Number(row.user_id),
            email: row.email,
            full_name: row.full_name,
            role: row.role,
            created_at: this.timestamp(row.created_at),
        };
    }
}
