import path from 'path';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cookie from '@fastify/cookie';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import view from '@fastify/view';
import * as nunjucks from 'nunjucks';
import type { AppConfig } from './config';
import logger from './config/logger';
import { isAppError, StorageError, type ErrorKind } from './errors';
import { createAuthHooks } from './modules/auth/auth.middleware';
import authRoutes from './modules/auth/auth.routes';
import type { AuthService } from './modules/auth/auth.service';
import catalogRoutes from './modules/catalog/catalog.routes';
import type { CatalogService } from './modules/catalog/catalog.service';
import healthRoutes, { type DatabaseProbe } from './modules/health/health.routes';
import webRoutes from './modules/web/web.routes';

export interface AppDependencies {
    config: AppConfig;
    authService: AuthService;
    catalogService: CatalogService;
    databaseProbe: DatabaseProbe;
}

interface ErrorBody {
    error: string;
    kind: ErrorKind;
}

// Fastify's own errors (bad JSON, unsupported media type, ...) carry a statusCode
function clientStatusOf(error: unknown): number | null {
    if (typeof error === 'object' && error !== null && 'statusCode' in error) {
        const status = error.statusCode;
        if (typeof status === 'number' && status >= 400 && status < 500) {
            return status;
        }
    }
    return null;
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export async function buildServer(deps: AppDependencies): Promise<FastifyInstance> {
    const { config } = deps;
    const server = Fastify({ logger: false });
    const hooks = createAuthHooks(deps.authService, config.session);

    // Cookie parsing must be in place before the identity hook runs
    await server.register(cors, {
        origin: '*',
        methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    });
    await server.register(cookie, { secret: config.session.secret });
    await server.register(formbody);
    await server.register(view, {
        engine: { nunjucks },
        root: path.isAbsolute(config.viewsDir) ? config.viewsDir : path.resolve(process.cwd(), config.viewsDir),
    });

    server.decorateRequest('auth', null);

    if (config.httpRequestLogging) {
        server.addHook('onResponse', async (request, reply) => {
            logger.http(`${request.method} ${request.url} ${reply.statusCode} ${Math.round(reply.elapsedTime)}ms`);
        });
    }

    server.setErrorHandler((error, request, reply) => {
        if (isAppError(error)) {
            if (error.statusCode >= 500) {
                const cause = error instanceof StorageError ? error.reason : error;
                logger.error(`${request.method} ${request.url} failed: ${error.message}`, { error: cause });
            }
            const body: ErrorBody = { error: error.message, kind: error.kind };
            return reply.status(error.statusCode).send(body);
        }

        const status = clientStatusOf(error);
        if (status !== null) {
            const body: ErrorBody = { error: messageOf(error), kind: 'validation_error' };
            return reply.status(status).send(body);
        }

        logger.error(`Unhandled error on ${request.method} ${request.url}: ${messageOf(error)}`, { error });
        const body: ErrorBody = { error: 'Internal Server Error', kind: 'internal_error' };
        return reply.status(500).send(body);
    });

    server.setNotFoundHandler((request, reply) => {
        const pathname = request.url.split('?')[0];
        reply.status(404).send({
            message: `The requested path '${pathname}' was not found on this server`,
            status: 'error',
            timestamp: new Date().toISOString(),
        });
    });

    // Register feature modules
    server.register(healthRoutes, {
        service: config.serviceName,
        version: config.version,
        probe: deps.databaseProbe,
    });

    // Routes that see request.auth; /health stays outside this scope
    server.register(async (scope) => {
        scope.addHook('onRequest', hooks.loadIdentity);

        scope.register(authRoutes, { prefix: '/api/auth', authService: deps.authService, hooks });
        scope.register(catalogRoutes, { prefix: '/api', catalogService: deps.catalogService, hooks });
        scope.register(webRoutes, {
            authService: deps.authService,
            catalogService: deps.catalogService,
            hooks,
            serviceName: config.serviceName,
            version: config.version,
        });
    });

    return server;
}
