import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import { Actor } from './interfaces/actor.interface';

export const CurrentUser = createParamDecorator(
    (_data: unknown, ctx: ExecutionContext): Actor => {
        const request = ctx.switchToHttp().getRequest<Request & { user?: Actor }>();
        if (!request.user) {
            throw new UnauthorizedException('Authentication required');
        }
        return request.user;
    },
);
