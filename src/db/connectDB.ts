import { drizzle, PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  db: Database;
  client: postgres.Sql;
}

// Create postgres client and drizzle instance with schema
export const createDatabase = (connectionString: string): DatabaseConnection => {
  const client = postgres(connectionString);
  const db = drizzle(client, { schema });
  return { db, client };
};

// Function to test database connection
export const connectDB = async ({ client }: DatabaseConnection): Promise<void> => {
  await client`SELECT 1`;
  console.log('✅ Database connected successfully');
};

// Function to disconnect from database (useful for graceful shutdown)
export const disconnectDB = async ({ client }: DatabaseConnection): Promise<void> => {
  try {
    await client.end();
    console.log('✅ Database disconnected successfully');
  } catch (error) {
    console.error('❌ Database disconnection failed:', error);
    throw error;
  }
};
