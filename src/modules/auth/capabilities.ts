import { ForbiddenException } from '@nestjs/common';
import { UserRole } from '../database/entities/user.entity';
import { Actor } from './interfaces/actor.interface';

export type RentalAction =
    | 'fleet:read'
    | 'fleet:manage'
    | 'availability:search'
    | 'booking:create'
    | 'booking:create-on-behalf'
    | 'booking:read-own'
    | 'booking:read-all'
    | 'booking:decide'
    | 'booking:charge'
    | 'maintenance:manage'
    | 'users:manage'
    | 'database:migrate';

const CUSTOMER_ACTIONS: readonly RentalAction[] = [
    'fleet:read',
    'availability:search',
    'booking:create',
    'booking:read-own',
];

export const CAPABILITIES: Readonly<Record<UserRole, ReadonlySet<RentalAction>>> = {
    customer: new Set(CUSTOMER_ACTIONS),
    admin: new Set<RentalAction>([
        ...CUSTOMER_ACTIONS,
        'fleet:manage',
        'booking:create-on-behalf',
        'booking:read-all',
        'booking:decide',
        'booking:charge',
        'maintenance:manage',
        'users:manage',
        'database:migrate',
    ]),
};

export function can(actor: Actor, action: RentalAction): boolean {
    return CAPABILITIES[actor.role]?.has(action) ?? false;
}

export function assertCan(actor: Actor, action: RentalAction): void {
    if (!can(actor, action)) {
        throw new ForbiddenException(`Role ${actor.role} may not perform ${action}`);
    }
}
