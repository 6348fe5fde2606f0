import { and, asc, desc, eq, inArray, sql } from 'drizzle-orm';
import pg from 'pg';
import type { Database } from '@/config/database';
import {
  categories,
  communities,
  communityCategories,
  communityFavorites,
  communityMemberships
} from '@/db/schema';
import type {
  Category,
  Community,
  CommunityWithCategories,
  NewCommunity
} from '@/types/community.types';

const NAME_UNIQUE_INDEX = 'communities_name_lower_idx';
const FAVORITE_MEMBERSHIP_FK = 'community_favorites_membership_fk';

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

export class CommunityNameTakenError extends Error {
  constructor(public readonly communityName: string) {
    super(`Community name "${communityName}" is already taken`);
    this.name = 'CommunityNameTakenError';
  }
}

/** A favorite was added for a user who is not a member of the community. */
export class MembershipRequiredError extends Error {
  constructor(public readonly userId: string, public readonly communityId: string) {
    super(`User ${userId} is not a member of community ${communityId}`);
    this.name = 'MembershipRequiredError';
  }
}

export interface CommunityRepository {
  /** Case-insensitive. */
  isNameTaken(name: string): Promise<boolean>;
  findByName(name: string): Promise<CommunityWithCategories | null>;
  /**
   * Inserts the community, links its categories and makes the creator a
   * member. Throws CommunityNameTakenError when the name is in use.
   */
  create(data: NewCommunity, categoryIds: string[]): Promise<CommunityWithCategories>;
  findJoinedBy(userId: string): Promise<CommunityWithCategories[]>;
  findFavoritedBy(userId: string): Promise<CommunityWithCategories[]>;
  isMember(userId: string, communityId: string): Promise<boolean>;
  isFavorite(userId: string, communityId: string): Promise<boolean>;
  addMember(userId: string, communityId: string): Promise<void>;
  /** Also drops the favorite, if any. */
  removeMember(userId: string, communityId: string): Promise<void>;
  /** Throws MembershipRequiredError when the user is not a member. */
  addFavorite(userId: string, communityId: string): Promise<void>;
  removeFavorite(userId: string, communityId: string): Promise<void>;
}

const isConstraintViolation = (error: unknown, code: string, constraint: string): boolean => {
  const candidate = error instanceof Error && error.cause instanceof pg.DatabaseError ? error.cause : error;
  return candidate instanceof pg.DatabaseError && candidate.code === code && candidate.constraint === constraint;
};

const sameName = (name: string) => sql`lower(${communities.name}) = lower(${name})`;

export class DrizzleCommunityRepository implements CommunityRepository {
  constructor(private readonly db: Database) {}

  async isNameTaken(name: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: communities.id })
      .from(communities)
      .where(sameName(name))
      .limit(1);

    return rows.length > 0;
  }

  async findByName(name: string): Promise<CommunityWithCategories | null> {
    const rows = await this.db.select().from(communities).where(sameName(name)).limit(1);
    const [community] = await this.withCategories(rows);

    return community ?? null;
  }

  async create(data: NewCommunity, categoryIds: string[]): Promise<CommunityWithCategories> {
    try {
      return await this.db.transaction(async (tx) => {
        const [community] = await tx.insert(communities).values(data).returning();

        if (categoryIds.length > 0) {
          await tx
            .insert(communityCategories)
            .values(categoryIds.map((categoryId) => ({ communityId: community.id, categoryId })));
        }

        await tx
          .insert(communityMemberships)
          .values({ userId: community.creatorId, communityId: community.id });

        const linked = categoryIds.length > 0
          ? await tx
              .select()
              .from(categories)
              .where(inArray(categories.id, categoryIds))
              .orderBy(asc(categories.name))
          : [];

        return { ...community, categories: linked };
      });
    } catch (error) {
      if (isConstraintViolation(error, UNIQUE_VIOLATION, NAME_UNIQUE_INDEX)) {
        throw new CommunityNameTakenError(data.name);
      }
      throw error;
    }
  }

  async findJoinedBy(userId: string): Promise<CommunityWithCategories[]> {
    const rows = await this.db
      .select({ community: communities })
      .from(communityMemberships)
      .innerJoin(communities, eq(communityMemberships.communityId, communities.id))
      .where(eq(communityMemberships.userId, userId))
      .orderBy(desc(communityMemberships.createdAt));

    return this.withCategories(rows.map((row) => row.community));
  }

  async findFavoritedBy(userId: string): Promise<CommunityWithCategories[]> {
    const rows = await this.db
      .select({ community: communities })
      .from(communityFavorites)
      .innerJoin(communities, eq(communityFavorites.communityId, communities.id))
      .where(eq(communityFavorites.userId, userId))
      .orderBy(desc(communityFavorites.createdAt));

    return this.withCategories(rows.map((row) => row.community));
  }

  async isMember(userId: string, communityId: string): Promise<boolean> {
    const rows = await this.db
      .select({ userId: communityMemberships.userId })
      .from(communityMemberships)
      .where(and(eq(communityMemberships.userId, userId), eq(communityMemberships.communityId, communityId)))
      .limit(1);

    return rows.length > 0;
  }

  async isFavorite(userId: string, communityId: string): Promise<boolean> {
    const rows = await this.db
      .select({ userId: communityFavorites.userId })
      .from(communityFavorites)
      .where(and(eq(communityFavorites.userId, userId), eq(communityFavorites.communityId, communityId)))
      .limit(1);

    return rows.length > 0;
  }

  async addMember(userId: string, communityId: string): Promise<void> {
    await this.db.insert(communityMemberships).values({ userId, communityId });
  }

  async removeMember(userId: string, communityId: string): Promise<void> {
    // community_favorites cascades from the membership row
    await this.db
      .delete(communityMemberships)
      .where(and(eq(communityMemberships.userId, userId), eq(communityMemberships.communityId, communityId)));
  }

  async addFavorite(userId: string, communityId: string): Promise<void> {
    try {
      await this.db.insert(communityFavorites).values({ userId, communityId });
    } catch (error) {
      // the membership was removed after the caller checked it
      if (isConstraintViolation(error, FOREIGN_KEY_VIOLATION, FAVORITE_MEMBERSHIP_FK)) {
        throw new MembershipRequiredError(userId, communityId);
      }
      throw error;
    }
  }

  async removeFavorite(userId: string, communityId: string): Promise<void> {
    await this.db
      .delete(communityFavorites)
      .where(and(eq(communityFavorites.userId, userId), eq(communityFavorites.communityId, communityId)));
  }

  private async withCategories(list: Community[]): Promise<CommunityWithCategories[]> {
    if (list.length === 0) {
      return [];
    }

    const links = await this.db
      .select({ communityId: communityCategories.communityId, category: categories })
      .from(communityCategories)
      .innerJoin(categories, eq(communityCategories.categoryId, categories.id))
      .where(inArray(communityCategories.communityId, list.map((community) => community.id)))
      .orderBy(asc(categories.name));

    const byCommunity = new Map<string, Category[]>();
    for (const link of links) {
      const bucket = byCommunity.get(link.communityId) ?? [];
      bucket.push(link.category);
      byCommunity.set(link.communityId, bucket);
    }

    return list.map((community) => ({ ...community, categories: byCommunity.get(community.id) ?? [] }));
  }
}
