import { ForbiddenException } from '@nestjs/common';
import { createDateRange, today } from '../common/date-range';
import { InvalidRangeException, RecordNotFoundException } from '../common/errors/rental.errors';
import { Actor } from '../modules/auth/interfaces/actor.interface';
import { Car } from '../modules/database/entities/car.entity';
import {
  createRentalFixture,
  RentalFixture,
  seedActor,
  seedApprovedBooking,
  seedCar,
} from './__mocks__/rental.fixture';

let fx: RentalFixture;
let admin: Actor;
let alice: Actor;
let car: Car;

beforeEach(async () => {
  fx = createRentalFixture();
  admin = await seedActor(fx, 'admin');
  alice = await seedActor(fx, 'customer');
  car = await seedCar(fx);
});

describe('maintenanceService: open', () => {
  test('opens an open-ended window with defaults', async () => {
    const window = await fx.maintenanceService.open(admin, {
      car_id: car.id,
      type: ' oil change ',
      start_date: '2025-02-01',
    });

    expect(window).toMatchObject({
      car_id: car.id,
      type: 'oil change',
      cost_cents: 0,
      start_date: '2025-02-01',
      end_date: null,
      is_open: true,
      notes: null,
      warnings: [],
    });
  });

  test('warns about approved bookings it overlaps without touching them', async () => {
    const booking = await seedApprovedBooking(fx, admin, alice, car.id, '2025-02-03', '2025-02-06');
    await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-02-04', end_date: '2025-02-05' });

    const window = await fx.maintenanceService.open(admin, {
      car_id: car.id,
      type: 'tyres',
      start_date: '2025-02-05',
      end_date: '2025-02-05',
      cost_cents: 32000,
    });

    expect(window.warnings).toEqual([
      { booking_id: booking.id, user_id: alice.id, start_date: '2025-02-03', end_date: '2025-02-06' },
    ]);
    expect((await fx.bookings.findById(booking.id))?.status).toBe('approved');
  });

  test('a window starting on a return day does not warn', async () => {
    await seedApprovedBooking(fx, admin, alice, car.id, '2025-02-03', '2025-02-06');

    const window = await fx.maintenanceService.open(admin, { car_id: car.id, type: 'wash', start_date: '2025-02-06' });
    expect(window.warnings).toEqual([]);
  });

  test('an end before the start is an invalid range', async () => {
    await expect(fx.maintenanceService.open(admin, {
      car_id: car.id,
      type: 'tyres',
      start_date: '2025-02-05',
      end_date: '2025-02-04',
    })).rejects.toThrow(new InvalidRangeException('end_date 2025-02-04 must not be before start_date 2025-02-05'));
    expect(fx.db.tables.maintenance).toHaveLength(0);
  });

  test('an unknown car is NotFound', async () => {
    await expect(fx.maintenanceService.open(admin, { car_id: 999, type: 'tyres', start_date: '2025-02-05' }))
      .rejects.toThrow('Car 999 not found');
    expect(fx.db.tables.maintenance).toHaveLength(0);
  });

  test('takes the car row lock that approval takes', async () => {
    const before = fx.cars.locks;

    await fx.maintenanceService.open(admin, { car_id: car.id, type: 'tyres', start_date: '2025-02-05' });

    expect(fx.cars.locks).toBe(before + 1);
  });

  test('customers cannot manage maintenance', async () => {
    await expect(fx.maintenanceService.open(alice, { car_id: car.id, type: 'tyres', start_date: '2025-02-05' }))
      .rejects.toBeInstanceOf(ForbiddenException);
    await expect(fx.maintenanceService.findAll(alice)).rejects.toBeInstanceOf(ForbiddenException);
  });
});

describe('maintenanceService: close', () => {
  test('closing without a date ends the window today', async () => {
    const window = await fx.maintenanceService.open(admin, { car_id: car.id, type: 'brakes', start_date: '2025-01-01' });

    const closed = await fx.maintenanceService.close(admin, window.id);

    expect(closed.end_date).toBe(today());
    expect(closed.is_open).toBe(false);
  });

  test('closing keeps earlier notes unless new ones are given', async () => {
    const window = await fx.maintenanceService.open(admin, {
      car_id: car.id,
      type: 'brakes',
      start_date: '2025-01-01',
      notes: 'front pads',
    });

    const closed = await fx.maintenanceService.close(admin, window.id, { end_date: '2025-01-03' });
    expect(closed).toMatchObject({ end_date: '2025-01-03', notes: 'front pads' });

    const reclosed = await fx.maintenanceService.close(admin, window.id, { end_date: '2025-01-04', notes: 'rear pads too' });
    expect(reclosed).toMatchObject({ end_date: '2025-01-04', notes: 'rear pads too' });
  });

  test('a one-day window can end on its start date', async () => {
    const window = await fx.maintenanceService.open(admin, { car_id: car.id, type: 'wash', start_date: '2025-01-05' });

    const closed = await fx.maintenanceService.close(admin, window.id, { end_date: '2025-01-05' });

    expect(closed.end_date).toBe('2025-01-05');
    expect(await fx.maintenanceService.openWindowsFor(car.id, createDateRange('2025-01-06', '2025-01-07'))).toEqual([]);
  });

  test('closing before the start is an invalid range', async () => {
    const window = await fx.maintenanceService.open(admin, { car_id: car.id, type: 'brakes', start_date: '2025-01-05' });

    await expect(fx.maintenanceService.close(admin, window.id, { end_date: '2025-01-01' }))
      .rejects.toBeInstanceOf(InvalidRangeException);
    expect((await fx.maintenance.findById(window.id))?.end_date).toBeNull();
  });

  test('moving the end date later warns about approved bookings it now covers', async () => {
    const window = await fx.maintenanceService.open(admin, {
      car_id: car.id,
      type: 'engine',
      start_date: '2025-06-01',
      end_date: '2025-06-05',
    });
    expect(window.warnings).toEqual([]);
    const booking = await seedApprovedBooking(fx, admin, alice, car.id, '2025-06-10', '2025-06-15');

    const reclosed = await fx.maintenanceService.close(admin, window.id, { end_date: '2025-06-20' });

    expect(reclosed.end_date).toBe('2025-06-20');
    expect(reclosed.warnings).toEqual([
      { booking_id: booking.id, user_id: alice.id, start_date: '2025-06-10', end_date: '2025-06-15' },
    ]);
    expect((await fx.bookings.findById(booking.id))?.status).toBe('approved');
  });

  test('closing takes the car row lock', async () => {
    const window = await fx.maintenanceService.open(admin, { car_id: car.id, type: 'brakes', start_date: '2025-01-01' });
    const before = fx.cars.locks;

    const closed = await fx.maintenanceService.close(admin, window.id, { end_date: '2025-01-02' });

    expect(fx.cars.locks).toBe(before + 1);
    expect(closed.warnings).toEqual([]);
  });

  test('closing an unknown window is NotFound', async () => {
    await expect(fx.maintenanceService.close(admin, 4242, { end_date: '2025-01-01' }))
      .rejects.toThrow(new RecordNotFoundException('Maintenance window', 4242));
  });
});

describe('maintenanceService: queries', () => {
  let early: number;
  let late: number;
  let other: number;

  beforeEach(async () => {
    const second = await seedCar(fx, { make: 'Honda' });
    early = (await fx.maintenanceService.open(admin, { car_id: car.id, type: 'a', start_date: '2025-01-01', end_date: '2025-01-02' })).id;
    late = (await fx.maintenanceService.open(admin, { car_id: car.id, type: 'b', start_date: '2025-03-01' })).id;
    other = (await fx.maintenanceService.open(admin, { car_id: second.id, type: 'c', start_date: '2025-02-01' })).id;
  });

  test('lists newest first by default', async () => {
    const windows = await fx.maintenanceService.findAll(admin);
    expect(windows.map(window => window.id)).toEqual([late, other, early]);
  });

  test('filters by car, state and sort order', async () => {
    const open = await fx.maintenanceService.findAll(admin, { state: 'open', sort: 'start_asc' });
    expect(open.map(window => window.id)).toEqual([other, late]);

    const closed = await fx.maintenanceService.findAll(admin, { car_id: car.id, state: 'closed' });
    expect(closed.map(window => window.id)).toEqual([early]);
  });

  test('openWindowsFor returns windows touching the range', async () => {
    const windows = await fx.maintenanceService.openWindowsFor(car.id, createDateRange('2025-01-02', '2025-06-01'));
    expect(windows.map(window => window.id)).toEqual([early, late]);
  });

  test('findById returns one window or NotFound', async () => {
    await expect(fx.maintenanceService.findById(admin, late)).resolves.toMatchObject({ type: 'b', is_open: true });
    await expect(fx.maintenanceService.findById(admin, 4242)).rejects.toBeInstanceOf(RecordNotFoundException);
  });
});
