import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { parseId, parseInput } from '../../utils/validation';
import type { AuthHooks } from '../auth/auth.middleware';
import type { CatalogService } from './catalog.service';
import type { CategoryParams, CreateItemBody } from './catalog.types';

export interface CatalogRoutesOptions {
    catalogService: CatalogService;
    hooks: AuthHooks;
}

const createItemSchema = z.object({
    title: z.string().max(255),
    description: z.string().nullish(),
    data: z.record(z.unknown()).nullish(),
    categoryId: z.number().int().positive(),
});

const catalogRoutes: FastifyPluginAsync<CatalogRoutesOptions> = async (
    fastify: FastifyInstance,
    { catalogService, hooks },
) => {
    // GET /api/categories - Visible categories
    fastify.get('/categories', async (request, reply) => {
        const categories = await catalogService.getAllCategories();
        reply.send({ categories });
    });

    // GET /api/categories/:id/items - Active items of one category
    fastify.get<{ Params: CategoryParams }>('/categories/:id/items', async (request, reply) => {
        const categoryId = parseId(request.params.id, 'category ID');
        const items = await catalogService.getItemsByCategory(categoryId);
        reply.send({ items });
    });

    // DELETE /api/categories/:id - Delete a category and, by cascade, its items
    fastify.delete<{ Params: CategoryParams }>(
        '/categories/:id',
        { preHandler: [hooks.requireApiAuth, hooks.verifyCsrf] },
        async (request, reply) => {
            const categoryId = parseId(request.params.id, 'category ID');
            await catalogService.deleteCategoryById(categoryId);
            reply.status(204).send();
        },
    );

    // GET /api/items - Active items with their category
    fastify.get('/items', async (request, reply) => {
        const items = await catalogService.getAllItems();
        reply.send({ items });
    });

    // POST /api/items - Create an item
    fastify.post<{ Body: CreateItemBody }>(
        '/items',
        { preHandler: [hooks.requireApiAuth, hooks.verifyCsrf] },
        async (request, reply) => {
            const body = parseInput(createItemSchema, request.body);
            const item = await catalogService.createItem(body);
            reply.status(201).send({ item });
        },
    );
};

export default catalogRoutes;
