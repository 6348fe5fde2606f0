import { logger } from '@/utils/logger';
import { ApiError, type FieldErrors } from '@/utils/ApiError';
import {
  CommunityNameTakenError,
  MembershipRequiredError,
  type CommunityRepository
} from '@/repositories/community.repository';
import type { CategoryRepository } from '@/repositories/category.repository';
import {
  CommunityType,
  type Category,
  type CommunityWithCategories,
  type CreateCommunityInput
} from '@/types/community.types';

export const COMMUNITY_NAME_TAKEN = 'The community name is already taken.';
export const MEMBERSHIP_REQUIRED = 'You must join the community before marking it as favorite';

const missingCategoryErrors = (requested: string[], found: Category[]): FieldErrors => {
  const known = new Set(found.map((category) => category.name));
  const missing = requested.filter((name) => !known.has(name));

  return missing.length > 0
    ? { categories: missing.map((name) => `Category "${name}" does not exist.`) }
    : {};
};

export class CommunityService {
  constructor(
    private readonly communities: CommunityRepository,
    private readonly categories: CategoryRepository
  ) {}

  async createCommunity(creatorId: string, input: CreateCommunityInput): Promise<CommunityWithCategories> {
    const { categories, errors } = await this.lookupCreateFields(input.name, input.categoryNames);

    if (Object.keys(errors).length > 0) {
      throw ApiError.badRequest('Validation failed', errors);
    }

    try {
      const community = await this.communities.create(
        {
          name: input.name,
          type: input.type,
          title: input.title,
          color: input.color,
          description: input.description,
          rules: input.rules,
          userAdjective: input.userAdjective,
          usersAdjective: input.usersAdjective,
          avatar: input.avatar,
          cover: input.cover,
          creatorId
        },
        categories.map((category) => category.id)
      );

      logger.info(`Community ${community.name} created by user ${creatorId}`);
      return community;
    } catch (error) {
      // lost a race with a concurrent create
      if (error instanceof CommunityNameTakenError) {
        throw ApiError.invalidField('name', COMMUNITY_NAME_TAKEN);
      }
      throw error;
    }
  }

  /**
   * Field errors a create with these values would hit against stored data.
   * Fields left undefined are not checked.
   */
  async findCreateConflicts(fields: { name?: string; categoryNames?: string[] }): Promise<FieldErrors> {
    const { errors } = await this.lookupCreateFields(fields.name, fields.categoryNames);
    return errors;
  }

  private async lookupCreateFields(
    name: string | undefined,
    categoryNames: string[] | undefined
  ): Promise<{ categories: Category[]; errors: FieldErrors }> {
    const [categories, nameTaken] = await Promise.all([
      categoryNames && categoryNames.length > 0 ? this.categories.findByNames(categoryNames) : [],
      name === undefined ? false : this.communities.isNameTaken(name)
    ]);

    return {
      categories,
      errors: {
        ...(categoryNames && missingCategoryErrors(categoryNames, categories)),
        ...(nameTaken && { name: [COMMUNITY_NAME_TAKEN] })
      }
    };
  }

  async assertNameAvailable(name: string): Promise<void> {
    if (await this.communities.isNameTaken(name)) {
      throw ApiError.invalidField('name', COMMUNITY_NAME_TAKEN);
    }
  }

  async getCommunity(name: string): Promise<CommunityWithCategories> {
    const community = await this.communities.findByName(name);

    if (!community) {
      throw ApiError.notFound('Community not found');
    }

    return community;
  }

  getJoinedCommunities(userId: string): Promise<CommunityWithCategories[]> {
    return this.communities.findJoinedBy(userId);
  }

  getFavoriteCommunities(userId: string): Promise<CommunityWithCategories[]> {
    return this.communities.findFavoritedBy(userId);
  }

  async joinCommunity(userId: string, name: string): Promise<CommunityWithCategories> {
    const community = await this.getCommunity(name);

    if (await this.communities.isMember(userId, community.id)) {
      throw ApiError.badRequest('You are already a member of this community');
    }

    if (community.type === CommunityType.PRIVATE) {
      throw ApiError.badRequest('Private communities can only be joined by invitation');
    }

    await this.communities.addMember(userId, community.id);
    logger.info(`User ${userId} joined community ${community.name}`);
    return community;
  }

  async leaveCommunity(userId: string, name: string): Promise<CommunityWithCategories> {
    const community = await this.getCommunity(name);

    if (!(await this.communities.isMember(userId, community.id))) {
      throw ApiError.badRequest('You are not a member of this community');
    }

    if (community.creatorId === userId) {
      throw ApiError.badRequest('The creator of a community cannot leave it');
    }

    await this.communities.removeMember(userId, community.id);
    logger.info(`User ${userId} left community ${community.name}`);
    return community;
  }

  async favoriteCommunity(userId: string, name: string): Promise<CommunityWithCategories> {
    const community = await this.getCommunity(name);

    if (!(await this.communities.isMember(userId, community.id))) {
      throw ApiError.badRequest(MEMBERSHIP_REQUIRED);
    }

    if (await this.communities.isFavorite(userId, community.id)) {
      throw ApiError.badRequest('Community is already a favorite');
    }

    try {
      await this.communities.addFavorite(userId, community.id);
    } catch (error) {
      if (error instanceof MembershipRequiredError) {
        throw ApiError.badRequest(MEMBERSHIP_REQUIRED);
      }
      throw error;
    }
    logger.info(`User ${userId} favorited community ${community.name}`);
    return community;
  }

  async unfavoriteCommunity(userId: string, name: string): Promise<CommunityWithCategories> {
    const community = await this.getCommunity(name);

    if (!(await this.communities.isFavorite(userId, community.id))) {
      throw ApiError.badRequest('Community is not a favorite');
    }

    await this.communities.removeFavorite(userId, community.id);
    logger.info(`User ${userId} unfavorited community ${community.name}`);
    return community;
  }
}
