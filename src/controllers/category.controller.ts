import { Request, Response, NextFunction } from 'express';
import type { CategoryRepository } from '@/repositories/category.repository';
import { createSuccessResponse } from '@/types/api.types';

export class CategoryController {
  constructor(private readonly categories: CategoryRepository) {}

  async getCategories(req: Request, res: Response, next: NextFunction) {
    try {
      const categories = await this.categories.findAll();

      res.json(createSuccessResponse(categories));
    } catch (error) {
      next(error);
    }
  }
}
