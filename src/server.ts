import { createApp } from './app';
import { codecConfig } from './config/codecConfig';

const app = createApp({ config: codecConfig });

const server = app.listen(codecConfig.port, () => {
  console.log(`CSV codec service running on port ${codecConfig.port}`);
  console.log(`Session time zone: ${codecConfig.sessionTimeZone}`);
  console.log(`Partition concurrency: ${codecConfig.partitionConcurrency}`);
});

// Handle uncaught exceptions
process.on('uncaughtException', (err: Error) => {
  console.error('UNCAUGHT EXCEPTION! Shutting down...');
  console.error(err.name, err.message);
  console.error(err.stack);
  process.exit(1);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  console.error('UNHANDLED REJECTION! Shutting down...');
  console.error(reason);
  process.exit(1);
});

// Graceful shutdown
const shutdown = (signal: string): void => {
  console.log(`${signal} received, closing server...`);
  server.close(() => process.exit(0));
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
