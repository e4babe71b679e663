export { BasePostgresRepository } from './base-postgres.repository';

export { UsersRepository } from './users.repository';
export { CarsRepository } from './cars.repository';
export { BookingsRepository } from './bookings.repository';
export { BookingChargesRepository } from './booking-charges.repository';
export { MaintenanceRepository } from './maintenance.repository';

export { UsersPostgresRepository } from './users-postgres.repository';
export { CarsPostgresRepository } from './cars-postgres.repository';
export { BookingsPostgresRepository } from './bookings-postgres.repository';
export { BookingChargesPostgresRepository } from './booking-charges-postgres.repository';
export { MaintenancePostgresRepository } from './maintenance-postgres.repository';
