import { and, asc, desc, eq } from 'drizzle-orm';
import type { Database } from '../../db/client';
import { withStorage } from '../../db/errors';
import { categories, items, type CategoryRow, type ItemRow } from '../../db/schema';
import type { Category, CreateItemBody, Item, ItemWithCategory } from './catalog.types';

export interface CatalogRepository {
    /** Visible categories ordered by display order, then display name. */
    listVisibleCategories(): Promise<Category[]>;
    findVisibleCategory(id: number): Promise<Category | null>;
    /** Active items of visible categories, newest first. */
    listActiveItems(): Promise<ItemWithCategory[]>;
    listActiveItemsInCategory(categoryId: number): Promise<Item[]>;
    insertItem(item: CreateItemBody): Promise<Item>;
    /** Items of the category are removed by the foreign key cascade. */
    deleteCategory(id: number): Promise<boolean>;
}

function toCategory(row: CategoryRow): Category {
    return { ...row };
}

function toItem(row: ItemRow): Item {
    return { ...row };
}

export class DrizzleCatalogRepository implements CatalogRepository {
    constructor(private readonly db: Database) { }

    listVisibleCategories(): Promise<Category[]> {
        return withStorage(async () => {
            const rows = await this.db
                .select()
                .from(categories)
                .where(eq(categories.isVisible, true))
                .orderBy(asc(categories.displayOrder), asc(categories.displayName));
            return rows.map(toCategory);
        });
    }

    findVisibleCategory(id: number): Promise<Category | null> {
        return withStorage(async () => {
            const [row] = await this.db
                .select()
                .from(categories)
                .where(and(eq(categories.id, id), eq(categories.isVisible, true)))
                .limit(1);
            return row ? toCategory(row) : null;
        });
    }

    listActiveItems(): Promise<ItemWithCategory[]> {
        return withStorage(async () => {
            const rows = await this.db
                .select({ item: items, category: categories })
                .from(items)
                .innerJoin(categories, eq(items.categoryId, categories.id))
                .where(and(eq(categories.isVisible, true), eq(items.isActive, true)))
                .orderBy(desc(items.createdAt));
            return rows.map((row) => ({ ...toItem(row.item), category: toCategory(row.category) }));
        });
    }

    listActiveItemsInCategory(categoryId: number): Promise<Item[]> {
        return withStorage(async () => {
            const rows = await this.db
                .select()
                .from(items)
                .where(and(eq(items.categoryId, categoryId), eq(items.isActive, true)))
                .orderBy(desc(items.createdAt));
            return rows.map(toItem);
        });
    }

    insertItem(item: CreateItemBody): Promise<Item> {
        return withStorage(async () => {
            const [row] = await this.db
                .insert(items)
                .values({
                    title: item.title,
                    description: item.description ?? null,
                    data: item.data ?? null,
                    categoryId: item.categoryId,
                })
                .returning();
            if (!row) {
                throw new Error('Insert returned no row');
            }
            return toItem(row);
        });
    }

    deleteCategory(id: number): Promise<boolean> {
        return withStorage(async () => {
            const deleted = await this.db
                .delete(categories)
                .where(eq(categories.id, id))
                .returning({ id: categories.id });
            return deleted.length > 0;
        });
    }
}
