import type { User } from '@/types/community.types';

declare global {
  namespace Express {
    interface Request {
      user?: Pick<User, 'id' | 'email' | 'username' | 'status'>;
    }
  }
}

export {};
