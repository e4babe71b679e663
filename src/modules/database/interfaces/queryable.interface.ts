import { QueryResult, QueryResultRow } from 'pg';

/** Anything that runs SQL: the pool, or the client holding an open transaction. */
export interface Queryable {
    query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}
