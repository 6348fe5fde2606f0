import { randomUUID } from 'crypto';
import type { AppRepositories } from '@/app';
import type { CategoryRepository } from '@/repositories/category.repository';
import {
  CommunityNameTakenError,
  MembershipRequiredError,
  type CommunityRepository
} from '@/repositories/community.repository';
import type { UserRepository } from '@/repositories/user.repository';
import type {
  Category,
  Community,
  CommunityWithCategories,
  NewCommunity,
  User
} from '@/types/community.types';

const byName = (a: Category, b: Category) => a.name.localeCompare(b.name);
const pairKey = (userId: string, communityId: string) => `${userId}:${communityId}`;

interface Link {
  userId: string;
  communityId: string;
  createdAt: Date;
}

/** Monotonic clock so "newest first" ordering is deterministic. */
const clock = () => {
  let tick = Date.UTC(2024, 0, 1);
  return () => new Date((tick += 1000));
};

export class InMemoryUserRepository implements UserRepository {
  readonly rows = new Map<string, User>();

  async findById(id: string): Promise<User | null> {
    return this.rows.get(id) ?? null;
  }
}

export class InMemoryCategoryRepository implements CategoryRepository {
  readonly rows: Category[] = [];

  async findAll(): Promise<Category[]> {
    return [...this.rows].sort(byName);
  }

  async findByNames(names: string[]): Promise<Category[]> {
    return this.rows.filter((category) => names.includes(category.name)).sort(byName);
  }
}

export class InMemoryCommunityRepository implements CommunityRepository {
  readonly rows: Community[] = [];
  readonly categoryLinks = new Map<string, string[]>();
  readonly memberships = new Map<string, Link>();
  readonly favorites = new Map<string, Link>();
  private readonly now = clock();

  constructor(private readonly categories: InMemoryCategoryRepository) {}

  async isNameTaken(name: string): Promise<boolean> {
    return this.find(name) !== undefined;
  }

  async findByName(name: string): Promise<CommunityWithCategories | null> {
    const community = this.find(name);
    return community ? this.withCategories(community) : null;
  }

  async create(data: NewCommunity, categoryIds: string[]): Promise<CommunityWithCategories> {
    if (this.find(data.name)) {
      throw new CommunityNameTakenError(data.name);
    }

    const community: Community = {
      id: data.id ?? randomUUID(),
      name: data.name,
      title: data.title,
      type: data.type,
      color: data.color,
      description: data.description ?? null,
      rules: data.rules ?? null,
      userAdjective: data.userAdjective ?? null,
      usersAdjective: data.usersAdjective ?? null,
      avatar: data.avatar ?? null,
      cover: data.cover ?? null,
      creatorId: data.creatorId,
      createdAt: data.createdAt ?? this.now()
    };

    this.rows.push(community);
    this.categoryLinks.set(community.id, [...categoryIds]);
    await this.addMember(community.creatorId, community.id);

    return this.withCategories(community);
  }

  async findJoinedBy(userId: string): Promise<CommunityWithCategories[]> {
    return this.listFor(this.memberships, userId);
  }

  async findFavoritedBy(userId: string): Promise<CommunityWithCategories[]> {
    return this.listFor(this.favorites, userId);
  }

  async isMember(userId: string, communityId: string): Promise<boolean> {
    return this.memberships.has(pairKey(userId, communityId));
  }

  async isFavorite(userId: string, communityId: string): Promise<boolean> {
    return this.favorites.has(pairKey(userId, communityId));
  }

  async addMember(userId: string, communityId: string): Promise<void> {
    this.memberships.set(pairKey(userId, communityId), { userId, communityId, createdAt: this.now() });
  }

  async removeMember(userId: string, communityId: string): Promise<void> {
    this.memberships.delete(pairKey(userId, communityId));
    this.favorites.delete(pairKey(userId, communityId));
  }

  async addFavorite(userId: string, communityId: string): Promise<void> {
    if (!this.memberships.has(pairKey(userId, communityId))) {
      throw new MembershipRequiredError(userId, communityId);
    }
    this.favorites.set(pairKey(userId, communityId), { userId, communityId, createdAt: this.now() });
  }

  async removeFavorite(userId: string, communityId: string): Promise<void> {
    this.favorites.delete(pairKey(userId, communityId));
  }

  private find(name: string): Community | undefined {
    return this.rows.find((community) => community.name.toLowerCase() === name.toLowerCase());
  }

  private withCategories(community: Community): CommunityWithCategories {
    const ids = this.categoryLinks.get(community.id) ?? [];
    const categories = this.categories.rows.filter((category) => ids.includes(category.id)).sort(byName);
    return { ...community, categories };
  }

  private listFor(links: Map<string, Link>, userId: string): CommunityWithCategories[] {
    return [...links.values()]
      .filter((link) => link.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .flatMap((link) => {
        const community = this.rows.find((row) => row.id === link.communityId);
        return community ? [this.withCategories(community)] : [];
      });
  }
}

export interface MemoryRepositories extends AppRepositories {
  users: InMemoryUserRepository;
  categories: InMemoryCategoryRepository;
  communities: InMemoryCommunityRepository;
}

export const createMemoryRepositories = (): MemoryRepositories => {
  const categories = new InMemoryCategoryRepository();
  return {
    users: new InMemoryUserRepository(),
    categories,
    communities: new InMemoryCommunityRepository(categories)
  };
};
