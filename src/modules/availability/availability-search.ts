import { Car } from '../database/entities/car.entity';

export type CandidatePage = (afterId: number, limit: number) => Promise<Car[]>;
export type FreeCheck = (car: Car) => Promise<boolean>;

/**
 * Lazy sequence of free cars, ascending by id. Candidates are fetched a page
 * at a time and checked one by one as the consumer pulls; every new
 * iteration starts over from the first page.
 */
export class AvailabilitySearch implements AsyncIterable<Car> {
    constructor(
        private readonly fetchPage: CandidatePage,
        private readonly isFree: FreeCheck,
        private readonly pageSize: number,
    ) { }

    async *[Symbol.asyncIterator](): AsyncGenerator<Car, void, undefined> {
        let afterId = 0;
        for (;;) {
            const page = await this.fetchPage(afterId, this.pageSize);
            for (const car of page) {
                if (await this.isFree(car)) {
                    yield car;
                }
            }
            if (page.length < this.pageSize) {
                return;
            }
            afterId = page[page.length - 1].id;
        }
    }

    async toArray(limit = Number.POSITIVE_INFINITY): Promise<Car[]> {
        const cars: Car[] = [];
        if (limit <= 0) {
            return cars;
        }
        for await (const car of this) {
            cars.push(car);
            if (cars.length >= limit) {
                break;
            }
        }
        return cars;
    }
}
