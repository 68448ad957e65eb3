import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import logger from '../../config/logger';
import type { DatabaseInfo } from '../../db/client';

export type DatabaseProbe = () => Promise<DatabaseInfo>;

export interface HealthRoutesOptions {
    service: string;
    version: string;
    probe: DatabaseProbe;
}

const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
    fastify: FastifyInstance,
    { service, version, probe },
) => {
    // --- Health check route ---
    fastify.get('/health', async (request, reply) => {
        try {
            const info = await probe();
            if (!info.connected) {
                return reply.status(503).send({ status: 'unhealthy', service, version, database: 'disconnected' });
            }
            return { status: 'healthy', service, version, database: 'connected' };
        } catch (error) {
            logger.error('Health check: database connection failed', { error });
            return reply.status(503).send({ status: 'unhealthy', service, version, database: 'disconnected' });
        }
    });
};

export default healthRoutes;
