import { createApp } from './app';
import { env } from './config/env';
import { db } from './db/connection';

const app = createApp();

const server = app.listen(env.port, () => {
  console.log(`Bill Data Extraction API running on port ${env.port}`);
  if (!env.googleApiKey) {
    console.warn('[Config] GOOGLE_API_KEY is not set; /extract-bill-data will answer 503');
  }
});

const shutdown = (signal: NodeJS.Signals) => {
  console.info(`[Server] ${signal} received, shutting down`);
  server.close(() => {
    db.close();
    process.exit(0);
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
