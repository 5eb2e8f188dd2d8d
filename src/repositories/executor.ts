import { PgDatabase } from 'drizzle-orm/pg-core';
import { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import * as schema from '../db/schema';

// Either the root database or an open transaction
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;
