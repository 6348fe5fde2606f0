import { randomUUID } from 'crypto';
import type { Server } from 'http';
import jwt from 'jsonwebtoken';
import { createApp } from '@/app';
import { config } from '@/config/config';
import type { Category, User } from '@/types/community.types';
import type { MemoryRepositories } from '@/test/memory-repositories';

let sequence = 0;
const next = () => ++sequence;

export const makeUser = (repositories: MemoryRepositories, overrides: Partial<User> = {}): User => {
  const n = next();
  const user: User = {
    id: randomUUID(),
    email: `user${n}@example.com`,
    username: `user${n}`,
    status: 'ACTIVE',
    createdAt: new Date(),
    ...overrides
  };
  repositories.users.rows.set(user.id, user);
  return user;
};

export const makeCategory = (repositories: MemoryRepositories, name = `category${next()}`): Category => {
  const category: Category = {
    id: randomUUID(),
    name,
    title: name.toUpperCase(),
    color: '#336699',
    createdAt: new Date()
  };
  repositories.categories.rows.push(category);
  return category;
};

export const tokenFor = (user: Pick<User, 'id'>): string =>
  jwt.sign({ userId: user.id }, config.jwtSecret, { expiresIn: '1h' });

export const authHeaders = (user: Pick<User, 'id'>): Record<string, string> => ({
  Authorization: `Bearer ${tokenFor(user)}`
});

export interface TestServer {
  origin: string;
  /** Absolute URL of an API route. */
  url: (path: string) => string;
  close: () => Promise<void>;
}

export const startServer = async (repositories: MemoryRepositories): Promise<TestServer> => {
  const app = createApp(repositories);

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  const { port } = address;

  const origin = `http://127.0.0.1:${port}`;

  return {
    origin,
    url: (path) => `${origin}/api/${config.apiVersion}${path}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
};

/** JSON body of a response, typed loosely for assertions. */
export const readJson = async (response: Response): Promise<Record<string, unknown>> => {
  const body: unknown = await response.json();
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new Error(`Expected a JSON object, got ${JSON.stringify(body)}`);
  }
  return { ...body };
};
