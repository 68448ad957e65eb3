export interface CategoryParams {
    id: string;
}

export interface Category {
    id: number;
    categoryName: string;
    displayName: string;
    isVisible: boolean;
    displayOrder: number;
    createdAt: Date;
    updatedAt: Date;
}

export interface Item {
    id: number;
    title: string;
    description: string | null;
    data: Record<string, unknown> | null;
    isActive: boolean;
    categoryId: number;
    createdAt: Date;
    updatedAt: Date;
}

export interface ItemWithCategory extends Item {
    category: Category;
}

export interface CreateItemBody {
    title: string;
    description?: string | null;
    data?: Record<string, unknown> | null;
    categoryId: number;
}
