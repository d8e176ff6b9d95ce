// src/index.ts
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config/env';
import { initializeDatabase } from './config/database';

// Load environment variables
dotenv.config();

async function startServer() {
  const config = loadConfig();
  const database = initializeDatabase({
    databaseUrl: config.databaseUrl,
    dialect: config.dialect,
    logging: config.nodeEnv === 'development'
  });

  await database.sequelize.authenticate();
  console.log('Database connection has been established successfully.');

  if (config.syncSchema) {
    await database.models.Person.sync();
    console.log('Table personas is ready.');
  }

  const app = createApp(database, {
    logRequests: config.nodeEnv === 'development',
    exposeErrorDetails: config.nodeEnv === 'development'
  });

  const server = app.listen(config.port, () => {
    console.log(`Server is running on port ${config.port}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down.`);
    server.closeAllConnections();
    server.close(() => {
      database.sequelize.close()
        .then(() => {
          console.log('Database connection closed.');
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('Unable to start the server:', error);
  process.exit(1);
});
