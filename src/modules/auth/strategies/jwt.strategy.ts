import { Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { UsersRepository } from '../../database/repositories/users.repository';
import { Actor } from '../interfaces/actor.interface';

export interface AccessTokenPayload {
    sub?: number | string;
}

/**
 * Verifies bearer tokens issued by the identity service and resolves them
 * to an actor. Credentials never reach this service.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
    private readonly logger = new Logger(JwtStrategy.name);

    constructor(
        configService: ConfigService,
        private readonly usersRepository: UsersRepository,
    ) {
        super({
            jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
            ignoreExpiration: false,
            secretOrKey: configService.getOrThrow<string>('JWT_SECRET'),
        });
    }

    async validate(payload: AccessTokenPayload): Promise<Actor> {
        const userId = Number(payload.sub);
        if (!Number.isInteger(userId) || userId <= 0) {
            throw new UnauthorizedException('Invalid token: missing user ID');
        }

        const user = await this.usersRepository.findById(userId);
        if (!user) {
            this.logger.warn(`❌ Token for unknown user: ${userId}`);
            throw new UnauthorizedException('User not found');
        }

        return { id: user.id, role: user.role, email: user.email };
    }
}
