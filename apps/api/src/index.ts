import 'dotenv/config';
import { loadConfig, logger } from './config/index.js';
import { EmbeddingService } from './embeddings/index.js';
import { buildServer } from './server.js';
import { connectDatabase, createPool, disconnectDatabase } from './services/database.js';
import { PgDocumentStore } from './services/document-store.js';
import { SearchService } from './services/search-service.js';

async function start() {
  const config = loadConfig();
  const pool = createPool(config.database.url);

  try {
    await connectDatabase(pool);

    const embeddingService = EmbeddingService.fromConfig(config.embeddings);
    const searchService = new SearchService(new PgDocumentStore(pool), embeddingService, config.search);

    const app = await buildServer({
      searchService,
      embeddingStatus: () => embeddingService.getStatus(),
      checkDatabase: async () => {
        await pool.query('SELECT 1 AS health_check');
      },
    }, {
      logger: {
        level: config.logLevel,
        transport: config.nodeEnv === 'development' ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname,reqId,res,responseTime',
            messageFormat: '{msg}',
            translateTime: 'HH:MM:ss UTC',
          },
        } : undefined,
      },
      frontendOrigin: config.server.frontendOrigin,
      nodeEnv: config.nodeEnv,
    });

    // Graceful shutdown
    const shutdown = async () => {
      logger.info('Shutting down server...');
      await app.close();
      await disconnectDatabase(pool);
      process.exit(0);
    };
    const onSignal = () => {
      shutdown().catch((error: unknown) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(`Server listening on http://${config.server.host}:${config.server.port}`);
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    await disconnectDatabase(pool);
    process.exit(1);
  }
}

void start();
