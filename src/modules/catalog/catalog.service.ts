import logger from '../../config/logger';
import { NotFoundError, ValidationError } from '../../errors';
import type { CatalogRepository } from './catalog.repository';
import type { Category, CreateItemBody, Item, ItemWithCategory } from './catalog.types';

export class CatalogService {
    constructor(private readonly repository: CatalogRepository) { }

    async getAllCategories(): Promise<Category[]> {
        return this.repository.listVisibleCategories();
    }

    async getCategoryById(id: number): Promise<Category> {
        const category = await this.repository.findVisibleCategory(id);
        if (!category) {
            throw new NotFoundError('Category not found.');
        }
        return category;
    }

    async getAllItems(): Promise<ItemWithCategory[]> {
        return this.repository.listActiveItems();
    }

    async getItemsByCategory(categoryId: number): Promise<Item[]> {
        await this.getCategoryById(categoryId);
        return this.repository.listActiveItemsInCategory(categoryId);
    }

    async createItem(data: CreateItemBody): Promise<Item> {
        const title = data.title.trim();
        if (title === '') {
            throw new ValidationError('Item title is required and must be a non-empty string.', 'title');
        }
        const category = await this.repository.findVisibleCategory(data.categoryId);
        if (!category) {
            throw new ValidationError('Category does not exist.', 'categoryId');
        }

        const item = await this.repository.insertItem({ ...data, title });
        logger.info(`Item created: ${item.id} in category ${category.categoryName}`);
        return item;
    }

    async deleteCategoryById(id: number): Promise<void> {
        const deleted = await this.repository.deleteCategory(id);
        if (!deleted) {
            throw new NotFoundError('Category not found to delete.');
        }
        logger.info(`Category deleted: ${id}`);
    }
}
