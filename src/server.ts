import 'reflect-metadata';
import { ApolloServer } from '@apollo/server';
import { startStandaloneServer } from '@apollo/server/standalone';
import { buildSchema } from './graphql/schema';
import { buildContext, createServices, GraphQLContext } from './graphql/context';
import { loadConfig } from './config/environment';
import { logger } from './utils/logger';
import { createDataSource, TrackingDatabase } from './repository/database';
import { QueueTransitionNotifier } from './jobs/notification_queue';

async function start() {
  const config = loadConfig();
  const db = new TrackingDatabase(createDataSource(config.database));
  const notifier = new QueueTransitionNotifier(config);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await notifier.close();
      await db.disconnect();
      logger.info('Database disconnected');
      process.exit(0);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Error during shutdown', { error: errorMessage });
      process.exit(1);
    }
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await db.connect();
  logger.info('Database connected successfully', { path: config.database.path });

  const services = createServices(db, notifier, { tracking: config.tracking });
  await services.actors.bootstrapAdmin(config.tracking.bootstrapAdminEmployeeId);

  const server = new ApolloServer<GraphQLContext>({
    schema: buildSchema(),
    introspection: config.server.nodeEnv === 'development',
  });

  const { url } = await startStandaloneServer(server, {
    listen: { port: config.server.port },
    context: async ({ req }) => buildContext(services, req.headers['x-actor-id']),
  });

  logger.info('Serial tracking service started', {
    url,
    environment: config.server.nodeEnv,
    port: config.server.port,
  });
}

start().catch((err) => {
  const errorMessage = err instanceof Error ? err.message : 'Unknown error';
  const stack = err instanceof Error ? err.stack : undefined;
  logger.error('Unhandled error during startup', { error: errorMessage, stack });
  process.exit(1);
});
