import { Router } from 'express';
import { CategoryController } from '@/controllers/category.controller';
import type { CategoryRepository } from '@/repositories/category.repository';

export const createCategoryRoutes = (categories: CategoryRepository): Router => {
  const router = Router();
  const categoryController = new CategoryController(categories);

  router.get('/', categoryController.getCategories.bind(categoryController));

  return router;
};
