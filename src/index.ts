import { buildServer } from './app';
import { createRepositories, createServices } from './bootstrap';
import { config, drainInvalidSettings } from './config';
import logger from './config/logger';
import { createDatabase, getConnectionInfo } from './db/client';
import { runMigrations } from './db/migrate';
import { ServiceManager } from './services/serviceManager';
import { SessionSweeper } from './services/sessionSweeper';

for (const key of drainInvalidSettings()) {
    logger.warn(`Ignoring invalid value for ${key}; using the default`);
}

if (!config.session.secret) {
    logger.warn('SESSION_SECRET is not set; session cookies will not be signed');
}

const database = createDatabase(config.database);
const services = createServices(createRepositories(database.db), config);

// Initialize service manager
const serviceManager = ServiceManager.getInstance();
serviceManager.registerService(new SessionSweeper(services.authService, config.session.sweepIntervalMs));

const serverPromise = buildServer({
    config,
    authService: services.authService,
    catalogService: services.catalogService,
    databaseProbe: () => getConnectionInfo(database.sql),
});

const start = async () => {
    try {
        const server = await serverPromise;
        const info = await getConnectionInfo(database.sql);
        logger.info(`Connected to database ${info.databaseName}`);
        await runMigrations(database.sql);

        await server.listen({ port: config.port, host: config.host });
        logger.info(`${config.serviceName} v${config.version} listening on ${config.host}:${config.port}`);

        await serviceManager.startAll();
    } catch (err) {
        logger.error('Failed to start server', { error: err });
        await database.close();
        process.exit(1);
    }
};

let shuttingDown = false;

// Handle graceful shutdown
const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
        await serviceManager.stopAll();

        const server = await serverPromise;
        await server.close();
        logger.info('HTTP server closed');

        await database.close();
        logger.info('Database connections closed');

        process.exit(0);
    } catch (error) {
        logger.error('Error during shutdown', { error });
        process.exit(1);
    }
};

process.on('SIGINT', (signal) => void shutdown(signal));
// Also handle SIGTERM for containerized environments
process.on('SIGTERM', (signal) => void shutdown(signal));

void start();
