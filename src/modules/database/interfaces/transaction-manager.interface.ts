import { Queryable } from './queryable.interface';

/**
 * Runs `work` inside one database transaction. The handle passed to `work`
 * must be threaded through every repository call that belongs to it; the
 * transaction commits when `work` resolves and rolls back when it throws.
 */
export abstract class TransactionManager {
    abstract transaction<T>(work: (db: Queryable) => Promise<T>): Promise<T>;
}
