export { createPool, getPoolConfig, warmupDatabase, withTransaction } from './client.js'
export type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg'
