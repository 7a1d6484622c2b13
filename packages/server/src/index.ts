import http from 'http';
import mongoose from 'mongoose';
import { Dispatcher, SubscriptionRegistry } from '@hubrelay/core';
import { MongoSubscriptionStore } from '@hubrelay/store-mongo';
import { RedisNotificationSink } from '@hubrelay/outbox';
import { loadConfig } from './config';
import { Logger, describeError } from './logger';
import { wireDispatcherLogging } from './events';
import { createHealthServer } from './health';
import { createWebhookServer } from './intake';
import { setupSignalHandlers } from './signals';

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger(config.logging.level);

  logger.info('Starting hubrelay', {
    port: config.server.port,
    streamKey: config.outbox.streamKey,
    timeoutMs: config.aggregation.timeoutMs,
  });

  // Connect to MongoDB
  await mongoose.connect(config.mongodb.uri);
  logger.info('Connected to MongoDB');

  const store = new MongoSubscriptionStore({ collectionName: config.mongodb.collectionName });
  await store.initialize();

  const registry = new SubscriptionRegistry(store, config.secrets.webhookKey);

  const sink = new RedisNotificationSink({
    redis: config.redis.url,
    streamKey: config.outbox.streamKey,
    maxStreamLength: config.outbox.maxStreamLength,
    dedupeTtlSeconds: config.outbox.dedupeTtlSeconds,
  });

  const dispatcher = new Dispatcher({
    sink,
    registry,
    aggregation: { timeoutMs: config.aggregation.timeoutMs },
  });
  wireDispatcherLogging(dispatcher, logger.child({ component: 'dispatcher' }));

  const intake = createWebhookServer({
    registry,
    dispatcher,
    logger: logger.child({ component: 'intake' }),
    maxBodyBytes: config.server.maxBodyBytes,
  });
  await new Promise<void>((resolve) => intake.listen(config.server.port, config.server.host, resolve));
  logger.info('Webhook intake listening', { host: config.server.host, port: config.server.port });

  let accepting = true;
  let healthServer: http.Server | undefined;
  if (config.health.enabled) {
    healthServer = createHealthServer({ port: config.health.port, dispatcher, isReady: () => accepting });
    logger.info('Health server listening', { port: config.health.port });
  }

  setupSignalHandlers({
    logger,
    onShutdown: async () => {
      logger.info('Shutting down...');
      accepting = false;
      await closeServer(intake);
      await dispatcher.stop();
      await sink.close();
      if (healthServer) {
        await closeServer(healthServer);
      }
      await mongoose.disconnect();
      logger.info('Shutdown complete');
    },
    onReload: () => {
      const next = loadConfig();
      logger.setLevel(next.logging.level);
      dispatcher.setTimeoutMs(next.aggregation.timeoutMs);
      logger.info('Applied reloaded settings', {
        level: next.logging.level,
        timeoutMs: next.aggregation.timeoutMs,
      });
    },
  });
}

main().catch((err: unknown) => {
  process.stderr.write(JSON.stringify({ level: 'error', msg: 'Fatal error', ...describeError(err) }) + '\n');
  process.exit(1);
});
