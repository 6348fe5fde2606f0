import { asc, inArray } from 'drizzle-orm';
import type { Database } from '@/config/database';
import { categories } from '@/db/schema';
import type { Category } from '@/types/community.types';

export interface CategoryRepository {
  findAll(): Promise<Category[]>;
  findByNames(names: string[]): Promise<Category[]>;
}

export class DrizzleCategoryRepository implements CategoryRepository {
  constructor(private readonly db: Database) {}

  async findAll(): Promise<Category[]> {
    return this.db.select().from(categories).orderBy(asc(categories.name));
  }

  async findByNames(names: string[]): Promise<Category[]> {
    if (names.length === 0) {
      return [];
    }

    return this.db
      .select()
      .from(categories)
      .where(inArray(categories.name, names))
      .orderBy(asc(categories.name));
  }
}
