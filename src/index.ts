import dotenv from 'dotenv';

// Load environment variables FIRST before reading configuration
dotenv.config();

import { loadConfig } from './config';
import { createApp } from './app';
import { connectDB, createDatabase, disconnectDB } from './db/connectDB';
import { createDrizzleDataStore } from './db/dataStore';

// Start server
const startServer = async (): Promise<void> => {
  const config = loadConfig();
  const connection = createDatabase(config.databaseUrl);

  // Connect to database
  await connectDB(connection);

  const app = createApp({ config, store: createDrizzleDataStore(connection.db) });

  const server = app.listen(config.port, () => {
    console.log(`🚀 Booking API is running on port ${config.port}`);
    console.log(`📊 Environment: ${config.nodeEnv}`);
    console.log(`📋 Health Check: http://localhost:${config.port}/health`);
  });

  // Handle graceful shutdown
  const shutdown = (signal: string): void => {
    console.log(`👋 ${signal} received. Shutting down gracefully...`);
    server.close(() => {
      disconnectDB(connection)
        .then(() => process.exit(0))
        .catch(() => process.exit(1));
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  console.error('❌ Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('❌ Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

startServer().catch((error: unknown) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
