import type { categories, communities, users } from '@/db/schema';

export const CommunityType = {
  PUBLIC: 'P',
  PRIVATE: 'T'
} as const;

export type CommunityType = (typeof CommunityType)[keyof typeof CommunityType];

export type User = typeof users.$inferSelect;
export type Category = typeof categories.$inferSelect;
export type Community = typeof communities.$inferSelect;
export type NewCommunity = typeof communities.$inferInsert;

export interface CommunityWithCategories extends Community {
  categories: Category[];
}

export interface CreateCommunityInput {
  name: string;
  type: CommunityType;
  title: string;
  color: string;
  categoryNames: string[];
  description?: string;
  rules?: string;
  userAdjective?: string;
  usersAdjective?: string;
  avatar?: string;
  cover?: string;
}
