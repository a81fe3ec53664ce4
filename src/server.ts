import dotenv from 'dotenv';
import { buildServices, createApp } from './app';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { startScheduler, stopScheduler } from './jobs/scheduler';

dotenv.config();

const config = loadConfig();
const services = buildServices(config);
const app = createApp(config, services);

const server = app.listen(config.port, () => {
  console.log(`Server listening on http://localhost:${config.port}`);
  if (!config.workflow.restaurantName) {
    console.warn('RESTAURANT_NAME is not set; "get reviews" will not fetch anything');
  }
  try {
    startScheduler({ store: services.store, messenger: services.messenger, reminders: config.reminders });
  } catch (e: unknown) {
    console.error('Failed to start scheduler:', errorMessage(e));
  }
});

const shutdown = () => {
  console.log('Shutting down...');
  stopScheduler();
  server.close(() => process.exit(0));
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
