import { BaseRepository } from '../interfaces/base-repository.interface';
import { Queryable } from '../interfaces/queryable.interface';
import { CandidateCriteria, Car, CarFilters, CreateCarData, UpdateCarData } from '../entities/car.entity';

export abstract class CarsRepository implements BaseRepository<Car, CreateCarData> {
    abstract findById(id: number, db?: Queryable): Promise<Car | null>;
    /** Locks the car row; approvals for one car serialize on it. */
    abstract findByIdForUpdate(id: number, db: Queryable): Promise<Car | null>;
    abstract findMany(filters?: CarFilters): Promise<Car[]>;
    /** Cars meeting `criteria` with `id > afterId`, ascending by id. */
    abstract findCandidates(criteria: CandidateCriteria, afterId: number, limit: number): Promise<Car[]>;
    abstract create(data: CreateCarData, db?: Queryable): Promise<Car>;
    abstract update(id: number, data: UpdateCarData): Promise<Car | null>;
    abstract delete(id: number): Promise<boolean>;
}
