import { Queryable } from './queryable.interface';

export interface BaseRepository<T, CreateData = Partial<T>> {
    findById(id: number, db?: Queryable): Promise<T | null>;
    create(data: CreateData, db?: Queryable): Promise<T>;
}
