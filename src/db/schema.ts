import { sql } from 'drizzle-orm';
import {
  pgTable,
  pgEnum,
  uuid,
  varchar,
  text,
  timestamp,
  primaryKey,
  foreignKey,
  uniqueIndex,
  index
} from 'drizzle-orm/pg-core';

export const userStatusEnum = pgEnum('user_status', ['ACTIVE', 'INACTIVE', 'SUSPENDED', 'BANNED']);

// P = public, T = private
export const communityTypeEnum = pgEnum('community_type', ['P', 'T']);

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  email: varchar('email', { length: 255 }).notNull().unique(),
  username: varchar('username', { length: 30 }).notNull().unique(),
  status: userStatusEnum('status').notNull().default('ACTIVE'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
});

export const categories = pgTable('categories', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: varchar('name', { length: 32 }).notNull().unique(),
  title: varchar('title', { length: 64 }).notNull(),
  color: varchar('color', { length: 7 }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
});

export const communities = pgTable(
  'communities',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: varchar('name', { length: 64 }).notNull(),
    title: varchar('title', { length: 64 }).notNull(),
    type: communityTypeEnum('type').notNull(),
    color: varchar('color', { length: 7 }).notNull(),
    description: text('description'),
    rules: text('rules'),
    userAdjective: varchar('user_adjective', { length: 64 }),
    usersAdjective: varchar('users_adjective', { length: 64 }),
    avatar: varchar('avatar', { length: 2048 }),
    cover: varchar('cover', { length: 2048 }),
    creatorId: uuid('creator_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => [
    uniqueIndex('communities_name_lower_idx').on(sql`lower(${table.name})`),
    index('communities_creator_idx').on(table.creatorId)
  ]
);

export const communityCategories = pgTable(
  'community_categories',
  {
    communityId: uuid('community_id')
      .notNull()
      .references(() => communities.id, { onDelete: 'cascade' }),
    categoryId: uuid('category_id')
      .notNull()
      .references(() => categories.id, { onDelete: 'cascade' })
  },
  (table) => [primaryKey({ columns: [table.communityId, table.categoryId] })]
);

export const communityMemberships = pgTable(
  'community_memberships',
  {
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    communityId: uuid('community_id')
      .notNull()
      .references(() => communities.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => [
    primaryKey({ columns: [table.userId, table.communityId] }),
    index('community_memberships_community_idx').on(table.communityId)
  ]
);

/**
 * A favorite references its membership row, so leaving a community
 * removes the favorite with it.
 */
export const communityFavorites = pgTable(
  'community_favorites',
  {
    userId: uuid('user_id').notNull(),
    communityId: uuid('community_id').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => [
    primaryKey({ columns: [table.userId, table.communityId] }),
    foreignKey({
      columns: [table.userId, table.communityId],
      foreignColumns: [communityMemberships.userId, communityMemberships.communityId],
      name: 'community_favorites_membership_fk'
    }).onDelete('cascade')
  ]
);
