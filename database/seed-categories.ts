import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import Joi from 'joi';
import { db, disconnect } from '@/config/database';
import { categories } from '@/db/schema';
import { logger } from '@/utils/logger';
import { HEX_COLOR_PATTERN } from '@/utils/validation';

interface CategorySeed {
  name: string;
  title: string;
  color: string;
}

const seedFile = fileURLToPath(new URL('./categories.json', import.meta.url));

const seedSchema = Joi.array().items(
  Joi.object<CategorySeed>({
    name: Joi.string().max(32).required(),
    title: Joi.string().max(64).required(),
    color: Joi.string().pattern(HEX_COLOR_PATTERN).required()
  })
);

async function seedCategories() {
  try {
    logger.info('🌱 Seeding categories...');

    const { error, value } = seedSchema.validate(JSON.parse(await readFile(seedFile, 'utf8')));
    if (error) {
      throw error;
    }
    const seeds: CategorySeed[] = value;

    const inserted = await db
      .insert(categories)
      .values(seeds)
      .onConflictDoNothing({ target: categories.name })
      .returning({ id: categories.id });

    logger.info(`✅ Seeded ${inserted.length} new categories (${seeds.length} in seed file)`);
  } catch (error) {
    logger.error(`❌ Seeding failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  } finally {
    await disconnect();
  }
}

void seedCategories();
