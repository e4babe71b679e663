import { BadRequestException, ForbiddenException } from '@nestjs/common';
import {
  BookingConflictException,
  InvalidBookingStateException,
  InvalidRangeException,
  RecordNotFoundException,
  VehicleUnavailableException,
} from '../common/errors/rental.errors';
import { overlaps } from '../common/date-range';
import { Actor } from '../modules/auth/interfaces/actor.interface';
import { Car } from '../modules/database/entities/car.entity';
import { BookingCreatedDto } from '../modules/bookings/dto/booking-response.dto';
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
let bob: Actor;
let car: Car;

beforeEach(async () => {
  fx = createRentalFixture();
  admin = await seedActor(fx, 'admin', 'admin@example.com');
  alice = await seedActor(fx, 'customer', 'alice@example.com');
  bob = await seedActor(fx, 'customer', 'bob@example.com');
  car = await seedCar(fx, { daily_rate_cents: 5000 });
});

describe('bookingsService: create', () => {
  test('records a pending booking priced from the current rate', async () => {
    const booking = await fx.bookingsService.create(alice, {
      car_id: car.id,
      start_date: '2025-01-05',
      end_date: '2025-01-10',
    });

    expect(booking).toMatchObject({
      user_id: alice.id,
      car_id: car.id,
      status: 'pending',
      rental_days: 5,
      daily_rate_cents: 5000,
      base_fee_cents: 25000,
      total_fee_cents: 25000,
      decided_by: null,
    });
    expect(booking.availability).toEqual({ available: true, conflicts: [] });
    expect(booking.charges).toEqual([]);
  });

  test('extras become charges and are folded into the total', async () => {
    const booking = await fx.bookingsService.create(admin, {
      user_id: alice.id,
      car_id: car.id,
      start_date: '2025-01-05',
      end_date: '2025-01-07',
      extras: [{ code: ' GPS ', amount_cents: 700 }, { code: 'CHILD_SEAT', amount_cents: 300 }],
    });

    expect(booking.total_fee_cents).toBe(11000);
    expect(booking.charges?.map(charge => [charge.code, charge.amount_cents])).toEqual([
      ['GPS', 700],
      ['CHILD_SEAT', 300],
    ]);
  });

  test('customers cannot price their own booking with extras', async () => {
    await expect(fx.bookingsService.create(alice, {
      car_id: car.id,
      start_date: '2025-01-05',
      end_date: '2025-01-08',
      extras: [{ code: 'DISCOUNT', amount_cents: -15000 }],
    })).rejects.toBeInstanceOf(ForbiddenException);

    expect(fx.db.tables.bookings).toHaveLength(0);
    expect(fx.db.tables.charges).toHaveLength(0);
  });

  test('a total past the INTEGER column is refused before anything is stored', async () => {
    const pricey = await seedCar(fx, { daily_rate_cents: 1_000_000_000 });

    await expect(fx.bookingsService.create(alice, { car_id: pricey.id, start_date: '2025-01-05', end_date: '2025-01-08' }))
      .rejects.toThrow(new BadRequestException('Booking total would exceed 2147483647 cents'));
    expect(fx.db.tables.bookings).toHaveLength(0);
  });

  test('a later rate change does not touch an existing booking', async () => {
    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-07' });
    await fx.carsService.update(admin, car.id, { daily_rate_cents: 9900 });

    const stored = await fx.bookingsService.findById(alice, booking.id);
    expect(stored.daily_rate_cents).toBe(5000);
    expect(stored.total_fee_cents).toBe(10000);
  });

  test('customers cannot book for someone else', async () => {
    await expect(fx.bookingsService.create(alice, {
      car_id: car.id,
      start_date: '2025-01-05',
      end_date: '2025-01-07',
      user_id: bob.id,
    })).rejects.toBeInstanceOf(ForbiddenException);
  });

  test('admins can book on behalf of a customer', async () => {
    const booking = await fx.bookingsService.create(admin, {
      car_id: car.id,
      start_date: '2025-01-05',
      end_date: '2025-01-07',
      user_id: bob.id,
    });
    expect(booking.user_id).toBe(bob.id);
  });

  test('an unknown booked-for user is NotFound', async () => {
    await expect(fx.bookingsService.create(admin, {
      car_id: car.id,
      start_date: '2025-01-05',
      end_date: '2025-01-07',
      user_id: 999,
    })).rejects.toThrow('User 999 not found');
  });

  test('an inverted or empty range is rejected and nothing is stored', async () => {
    await expect(fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-10', end_date: '2025-01-05' }))
      .rejects.toBeInstanceOf(InvalidRangeException);
    await expect(fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-10', end_date: '2025-01-10' }))
      .rejects.toBeInstanceOf(InvalidRangeException);
    expect(fx.db.tables.bookings).toHaveLength(0);
  });

  test('an unknown car is NotFound', async () => {
    await expect(fx.bookingsService.create(alice, { car_id: 999, start_date: '2025-01-05', end_date: '2025-01-07' }))
      .rejects.toThrow(new RecordNotFoundException('Car', 999));
  });

  test('a car flagged off the market is unavailable whatever the dates', async () => {
    await fx.carsService.setAvailability(admin, car.id, false);

    await expect(fx.bookingsService.create(alice, { car_id: car.id, start_date: '2030-01-05', end_date: '2030-01-07' }))
      .rejects.toThrow(new VehicleUnavailableException(car.id));
    expect(fx.db.tables.bookings).toHaveLength(0);
  });

  test('the rental length must fit the car policy', async () => {
    const picky = await seedCar(fx, { min_rent_days: 3, max_rent_days: 7 });

    await expect(fx.bookingsService.create(alice, { car_id: picky.id, start_date: '2025-01-05', end_date: '2025-01-07' }))
      .rejects.toThrow(`Car ${picky.id} must be rented for at least 3 day(s); requested 2`);
    await expect(fx.bookingsService.create(alice, { car_id: picky.id, start_date: '2025-01-01', end_date: '2025-01-09' }))
      .rejects.toThrow(`Car ${picky.id} can be rented for at most 7 day(s); requested 8`);

    const fits = await fx.bookingsService.create(alice, { car_id: picky.id, start_date: '2025-01-01', end_date: '2025-01-08' });
    expect(fits.rental_days).toBe(7);
  });

  test('a booking over approved dates is still recorded, with the conflict reported', async () => {
    const approved = await seedApprovedBooking(fx, admin, bob, car.id, '2025-01-05', '2025-01-10');

    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-08', end_date: '2025-01-12' });

    expect(booking.status).toBe('pending');
    expect(booking.availability).toEqual({
      available: false,
      conflicts: [{ kind: 'booking', id: approved.id, start_date: '2025-01-05', end_date: '2025-01-10' }],
    });
  });
});

describe('bookingsService: approve & reject', () => {
  test('approving records who decided', async () => {
    const created = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-10' });

    const approved = await fx.bookingsService.approve(admin, created.id);

    expect(approved.status).toBe('approved');
    expect(approved.decided_by).toBe(admin.id);
    expect(approved.decided_at).not.toBeNull();
    expect(fx.cars.locks).toBe(1);
  });

  test('an overlapping approved booking blocks approval and leaves the booking pending', async () => {
    const first = await seedApprovedBooking(fx, admin, bob, car.id, '2025-01-05', '2025-01-10');
    const second = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-09', end_date: '2025-01-11' });

    const error = await fx.bookingsService.approve(admin, second.id).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BookingConflictException);
    if (error instanceof BookingConflictException) {
      expect(error.code).toBe('CONFLICT');
      expect(error.conflicts).toEqual([
        { kind: 'booking', id: first.id, start_date: '2025-01-05', end_date: '2025-01-10' },
      ]);
    }
    expect((await fx.bookings.findById(second.id))?.status).toBe('pending');
  });

  test('a booking starting on the return day of another can be approved', async () => {
    await seedApprovedBooking(fx, admin, bob, car.id, '2025-01-05', '2025-01-10');
    const next = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-10', end_date: '2025-01-12' });

    const approved = await fx.bookingsService.approve(admin, next.id);
    expect(approved.status).toBe('approved');
  });

  test('maintenance blocks approval', async () => {
    const opened = await fx.maintenanceService.open(admin, { car_id: car.id, type: 'brakes', start_date: '2025-01-08' });
    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-20', end_date: '2025-01-22' });

    await expect(fx.bookingsService.approve(admin, booking.id)).rejects.toThrow(
      new BookingConflictException(booking.id, [
        { kind: 'maintenance', id: opened.id, start_date: '2025-01-08', end_date: null },
      ]),
    );
  });

  test('pending and rejected bookings never block', async () => {
    const rejected = await fx.bookingsService.create(bob, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-10' });
    await fx.bookingsService.reject(admin, rejected.id);
    const pending = await fx.bookingsService.create(bob, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-10' });
    const mine = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-06', end_date: '2025-01-08' });

    await expect(fx.bookingsService.approve(admin, mine.id)).resolves.toMatchObject({ status: 'approved' });
    await expect(fx.bookingsService.approve(admin, pending.id)).rejects.toBeInstanceOf(BookingConflictException);
  });

  test('other cars are unaffected', async () => {
    const other = await seedCar(fx, { make: 'Honda', model: 'Civic' });
    await seedApprovedBooking(fx, admin, bob, car.id, '2025-01-05', '2025-01-10');
    const booking = await fx.bookingsService.create(alice, { car_id: other.id, start_date: '2025-01-05', end_date: '2025-01-10' });

    await expect(fx.bookingsService.approve(admin, booking.id)).resolves.toMatchObject({ status: 'approved' });
  });

  test('decisions are final', async () => {
    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-10' });
    await fx.bookingsService.approve(admin, booking.id);

    await expect(fx.bookingsService.approve(admin, booking.id))
      .rejects.toThrow(`Booking ${booking.id} is approved; only pending bookings can be approved`);
    await expect(fx.bookingsService.reject(admin, booking.id)).rejects.toBeInstanceOf(InvalidBookingStateException);
  });

  test('rejecting stores the note', async () => {
    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-10' });

    const rejected = await fx.bookingsService.reject(admin, booking.id, '  no licence on file ');

    expect(rejected).toMatchObject({ status: 'rejected', decided_by: admin.id, decision_note: 'no licence on file' });
    await expect(fx.bookingsService.approve(admin, booking.id)).rejects.toBeInstanceOf(InvalidBookingStateException);
  });

  test('customers cannot decide', async () => {
    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-10' });

    await expect(fx.bookingsService.approve(alice, booking.id)).rejects.toBeInstanceOf(ForbiddenException);
    await expect(fx.bookingsService.reject(alice, booking.id)).rejects.toBeInstanceOf(ForbiddenException);
  });

  test('unknown bookings are NotFound', async () => {
    await expect(fx.bookingsService.approve(admin, 4242)).rejects.toThrow('Booking 4242 not found');
    await expect(fx.bookingsService.reject(admin, 4242)).rejects.toThrow('Booking 4242 not found');
  });
});

describe('bookingsService: charges & totals', () => {
  test('adding a charge raises the total by exactly its amount', async () => {
    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-10' });

    const charged = await fx.bookingsService.addCharge(admin, booking.id, { code: 'FUEL', amount_cents: 50 });

    expect(charged.total_fee_cents).toBe(booking.total_fee_cents + 50);
    expect(charged.charges?.map(charge => charge.code)).toEqual(['FUEL']);
  });

  test('charges can be added whatever the status', async () => {
    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-10' });
    await fx.bookingsService.approve(admin, booking.id);

    const charged = await fx.bookingsService.addCharge(admin, booking.id, { code: 'LATE_RETURN', amount_cents: 2500 });
    expect(charged).toMatchObject({ status: 'approved', total_fee_cents: 27500 });
  });

  test('a credit that would make the total negative is refused and rolled back', async () => {
    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-06' });

    await expect(fx.bookingsService.addCharge(admin, booking.id, { code: 'GOODWILL', amount_cents: -6000 }))
      .rejects.toThrow(new BadRequestException(`Booking ${booking.id} total would be negative (-1000 cents)`));
    expect(await fx.bookingsService.chargesFor(alice, booking.id)).toEqual([]);
    expect((await fx.bookings.findById(booking.id))?.total_fee_cents).toBe(5000);
  });

  test('recalculate rebuilds the total from its parts', async () => {
    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-08' });
    await fx.bookingsService.addCharge(admin, booking.id, { code: 'GPS', amount_cents: 700 });
    await fx.bookings.updateTotalFee(booking.id, 1);

    const recalculated = await fx.bookingsService.recalculate(admin, booking.id);

    expect(recalculated.total_fee_cents).toBe(15700);
  });

  test('customers cannot add charges', async () => {
    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-08' });
    await expect(fx.bookingsService.addCharge(alice, booking.id, { code: 'GPS', amount_cents: 700 }))
      .rejects.toBeInstanceOf(ForbiddenException);
  });

  test('charging an unknown booking is NotFound', async () => {
    await expect(fx.bookingsService.addCharge(admin, 4242, { code: 'GPS', amount_cents: 700 }))
      .rejects.toBeInstanceOf(RecordNotFoundException);
  });
});

describe('bookingsService: reads', () => {
  test('customers see their own bookings with charges', async () => {
    const booking = await fx.bookingsService.create(admin, {
      user_id: alice.id,
      car_id: car.id,
      start_date: '2025-01-05',
      end_date: '2025-01-06',
      extras: [{ code: 'GPS', amount_cents: 700 }],
    });

    const found = await fx.bookingsService.findById(alice, booking.id);
    expect(found.charges?.map(charge => charge.amount_cents)).toEqual([700]);
  });

  test("another customer's booking reads as missing", async () => {
    const booking = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-06' });

    await expect(fx.bookingsService.findById(bob, booking.id)).rejects.toThrow(`Booking ${booking.id} not found`);
    await expect(fx.bookingsService.chargesFor(bob, booking.id)).rejects.toBeInstanceOf(RecordNotFoundException);
    await expect(fx.bookingsService.findById(admin, booking.id)).resolves.toMatchObject({ user_id: alice.id });
  });

  test('customer listings are scoped to the caller', async () => {
    await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-06' });
    await fx.bookingsService.create(bob, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-06' });

    const mine = await fx.bookingsService.findAll(alice, { user_id: bob.id });
    expect(mine.map(booking => booking.user_id)).toEqual([alice.id]);

    const everyone = await fx.bookingsService.findAll(admin);
    expect(everyone).toHaveLength(2);
  });

  test('the pending queue lists undecided bookings oldest first', async () => {
    const first = await fx.bookingsService.create(alice, { car_id: car.id, start_date: '2025-01-05', end_date: '2025-01-06' });
    const second = await fx.bookingsService.create(bob, { car_id: car.id, start_date: '2025-02-05', end_date: '2025-02-06' });
    const third = await fx.bookingsService.create(bob, { car_id: car.id, start_date: '2025-03-05', end_date: '2025-03-06' });
    await fx.bookingsService.reject(admin, second.id);

    const queue = await fx.bookingsService.listPending(admin);

    expect(queue.map(booking => booking.id)).toEqual([first.id, third.id]);
    await expect(fx.bookingsService.listPending(alice)).rejects.toBeInstanceOf(ForbiddenException);
  });
});

/** Deterministic pseudo-random sequence so failures reproduce. */
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

describe('bookingsService: concurrent approvals', () => {
  test('of bookings that all share a day, exactly one wins', async () => {
    const ranges: Array<[string, string]> = [
      ['2025-03-01', '2025-03-06'],
      ['2025-03-03', '2025-03-04'],
      ['2025-02-27', '2025-03-04'],
      ['2025-03-02', '2025-03-08'],
      ['2025-03-03', '2025-03-10'],
    ];
    const pending: BookingCreatedDto[] = [];
    for (const [start, end] of ranges) {
      pending.push(await fx.bookingsService.create(alice, { car_id: car.id, start_date: start, end_date: end }));
    }

    const results = await Promise.allSettled(pending.map(booking => fx.bookingsService.approve(admin, booking.id)));

    expect(results.filter(result => result.status === 'fulfilled')).toHaveLength(1);
    for (const result of results) {
      if (result.status === 'rejected') {
        expect(result.reason).toBeInstanceOf(BookingConflictException);
      }
    }
    expect(fx.db.tables.bookings.filter(booking => booking.status === 'approved')).toHaveLength(1);
  });

  test('random interleavings never leave two approved bookings overlapping', async () => {
    const second = await seedCar(fx, { make: 'Honda', model: 'Civic' });
    const random = lcg(42);
    const pending: BookingCreatedDto[] = [];
    for (let i = 0; i < 30; i++) {
      const carId = random() < 0.5 ? car.id : second.id;
      const offset = Math.floor(random() * 20);
      const length = 1 + Math.floor(random() * 5);
      const start = `2025-04-${String(1 + offset).padStart(2, '0')}`;
      const end = `2025-04-${String(1 + offset + length).padStart(2, '0')}`;
      pending.push(await fx.bookingsService.create(alice, { car_id: carId, start_date: start, end_date: end }));
    }

    const order = [...pending].sort(() => random() - 0.5);
    const results = await Promise.allSettled(order.map(booking => fx.bookingsService.approve(admin, booking.id)));

    const approved = fx.db.tables.bookings.filter(booking => booking.status === 'approved');
    for (const a of approved) {
      for (const b of approved) {
        if (a.id < b.id && a.car_id === b.car_id) {
          expect(overlaps({ start: a.start_date, end: a.end_date }, { start: b.start_date, end: b.end_date })).toBe(false);
        }
      }
    }

    // Every refusal is explained by a booking that did get approved
    const stillPending = fx.db.tables.bookings.filter(booking => booking.status === 'pending');
    for (const booking of stillPending) {
      const blocker = approved.find(other =>
        other.car_id === booking.car_id &&
        overlaps({ start: other.start_date, end: other.end_date }, { start: booking.start_date, end: booking.end_date }));
      expect(blocker).toBeDefined();
    }
    expect(results.filter(result => result.status === 'fulfilled')).toHaveLength(approved.length);
    expect(approved.length + stillPending.length).toBe(30);
  });
});
