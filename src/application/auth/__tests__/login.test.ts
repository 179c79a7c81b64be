import { describe, it, expect, beforeEach } from 'vitest';
import jwt from 'jsonwebtoken';
import { LoginUseCase } from '../login.js';
import { InMemoryUserRepo, seedUser } from '../../../infra/db/__tests__/inMemoryUserRepo.js';
import { UnauthorizedError, UserNotActivatedError } from '../../errors.js';

const JWT_SECRET = 'test-secret';

describe('LoginUseCase', () => {
  let repo: InMemoryUserRepo;
  let useCase: LoginUseCase;

  beforeEach(() => {
    repo = new InMemoryUserRepo();
    useCase = new LoginUseCase(repo, JWT_SECRET, 3600);
  });

  it('should issue a token carrying the login and authorities', async () => {
    await seedUser(repo, { login: 'alice', authorities: ['ROLE_USER', 'ROLE_ADMIN'] });

    const result = await useCase.execute({ username: 'Alice', password: 'password123' });

    expect(result.login).toBe('alice');
    expect(result.authorities).toEqual(['ROLE_USER', 'ROLE_ADMIN']);
    const decoded = jwt.verify(result.token, JWT_SECRET);
    expect(decoded).toMatchObject({ sub: 'alice', auth: ['ROLE_USER', 'ROLE_ADMIN'] });
  });

  it('should reject an unknown login', async () => {
    await expect(
      useCase.execute({ username: 'ghost', password: 'password123' })
    ).rejects.toThrow(UnauthorizedError);
  });

  it('should reject a wrong password', async () => {
    await seedUser(repo, { login: 'alice' });

    await expect(
      useCase.execute({ username: 'alice', password: 'wrong-password' })
    ).rejects.toThrow('Invalid username or password');
  });

  it('should reject a user that is not activated', async () => {
    await seedUser(repo, { login: 'bob', activated: false });

    await expect(
      useCase.execute({ username: 'bob', password: 'password123' })
    ).rejects.toThrow(UserNotActivatedError);
  });
});
