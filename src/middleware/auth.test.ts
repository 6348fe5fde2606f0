import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import { config } from '@/config/config';
import { createMemoryRepositories, type MemoryRepositories } from '@/test/memory-repositories';
import { makeUser, readJson, startServer, tokenFor, type TestServer } from '@/test/helpers';

describe('authenticate', () => {
  let repositories: MemoryRepositories;
  let server: TestServer;

  const getJoined = (headers: Record<string, string>) => fetch(server.url('/joined-communities'), { headers });

  beforeEach(async () => {
    repositories = createMemoryRepositories();
    server = await startServer(repositories);
  });

  afterEach(async () => {
    await server.close();
  });

  it('requires a token', async () => {
    const response = await getJoined({});

    expect(response.status).toBe(401);
    expect(await readJson(response)).toEqual({ success: false, message: 'Access token required' });
  });

  it('accepts a bearer token', async () => {
    const user = makeUser(repositories);

    const response = await getJoined({ Authorization: `Bearer ${tokenFor(user)}` });

    expect(response.status).toBe(200);
  });

  it('accepts the access token cookie', async () => {
    const user = makeUser(repositories);

    const response = await getJoined({ Cookie: `accessToken=${tokenFor(user)}` });

    expect(response.status).toBe(200);
  });

  it('rejects a token signed with another secret', async () => {
    const user = makeUser(repositories);
    const token = jwt.sign({ userId: user.id }, 'another-secret');

    const response = await getJoined({ Authorization: `Bearer ${token}` });

    expect(response.status).toBe(401);
    expect((await readJson(response)).message).toBe('Invalid token');
  });

  it('rejects an expired token', async () => {
    const user = makeUser(repositories);
    const token = jwt.sign({ userId: user.id, exp: Math.floor(Date.now() / 1000) - 60 }, config.jwtSecret);

    const response = await getJoined({ Authorization: `Bearer ${token}` });

    expect(response.status).toBe(401);
    expect((await readJson(response)).message).toBe('Token expired');
  });

  it('rejects a token without a user id', async () => {
    const token = jwt.sign({ sub: 'someone' }, config.jwtSecret);

    const response = await getJoined({ Authorization: `Bearer ${token}` });

    expect(response.status).toBe(401);
    expect((await readJson(response)).message).toBe('Invalid token');
  });

  it('rejects a malformed token', async () => {
    const response = await getJoined({ Authorization: 'Bearer not-a-jwt' });

    expect(response.status).toBe(401);
    expect(await readJson(response)).toEqual({ success: false, message: 'Invalid token' });
  });

  it('rejects a user id that is not a UUID without looking it up', async () => {
    const findById = vi.spyOn(repositories.users, 'findById');
    const token = jwt.sign({ userId: 'user-42' }, config.jwtSecret);

    const response = await getJoined({ Authorization: `Bearer ${token}` });

    expect(response.status).toBe(401);
    expect((await readJson(response)).message).toBe('Invalid token');
    expect(findById).not.toHaveBeenCalled();
  });

  it('rejects a token for an unknown user', async () => {
    const token = tokenFor({ id: '00000000-0000-4000-8000-000000000000' });

    const response = await getJoined({ Authorization: `Bearer ${token}` });

    expect(response.status).toBe(401);
  });

  it('rejects an inactive account', async () => {
    const user = makeUser(repositories, { status: 'SUSPENDED' });

    const response = await getJoined({ Authorization: `Bearer ${tokenFor(user)}` });

    expect(response.status).toBe(401);
    expect((await readJson(response)).message).toBe('Account is not active');
  });
});
