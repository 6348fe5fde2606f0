import { eq } from 'drizzle-orm';
import type { Database } from '@/config/database';
import { users } from '@/db/schema';
import type { User } from '@/types/community.types';

export interface UserRepository {
  findById(id: string): Promise<User | null>;
}

export class DrizzleUserRepository implements UserRepository {
  constructor(private readonly db: Database) {}

  async findById(id: string): Promise<User | null> {
    const [user] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return user ?? null;
  }
}
