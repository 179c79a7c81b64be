import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import express from 'express';
import jwt from 'jsonwebtoken';
import { createTestApp, JWT_SECRET } from './testApp.js';
import { createApp } from '../app.js';
import { InMemoryUserRepo, seedUser } from '../../db/__tests__/inMemoryUserRepo.js';
import { UserService } from '../../../application/account/userService.js';
import { User } from '../../../domain/auth/user.js';

/** Lookups miss, as when another registration commits between check and insert. */
class StaleReadUserRepo extends InMemoryUserRepo {
  async findOneByLogin(): Promise<User | null> {
    return null;
  }

  async findOneByEmailIgnoreCase(): Promise<User | null> {
    return null;
  }
}

describe('Auth API', () => {
  let app: express.Application;
  let repo: InMemoryUserRepo;

  const registration = {
    login: 'NewUser',
    email: 'NewUser@example.com',
    password: 'password123',
    rePassword: 'password123',
    firstName: 'New',
  };

  beforeEach(() => {
    ({ app, repo } = createTestApp());
  });

  describe('POST /api/register', () => {
    it('should register an inactive user', async () => {
      const response = await request(app).post('/api/register').send(registration);

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        login: 'newuser',
        email: 'newuser@example.com',
        firstName: 'New',
        activated: false,
        authorities: ['ROLE_USER'],
      });
      expect(response.body).not.toHaveProperty('activationKey');
      expect(response.body).not.toHaveProperty('passwordHash');
    });

    it('should reject invalid email', async () => {
      const response = await request(app)
        .post('/api/register')
        .send({ ...registration, email: 'invalid-email' });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
    });

    it('should reject short password', async () => {
      const response = await request(app)
        .post('/api/register')
        .send({ ...registration, password: 'abc', rePassword: 'abc' });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'INVALID_PASSWORD');
    });

    it('should reject a confirmation that does not match', async () => {
      const response = await request(app)
        .post('/api/register')
        .send({ ...registration, rePassword: 'password124' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        code: 'PASSWORD_NOT_MATCH',
        message: 'Password and confirmation do not match',
      });
    });

    it('should reject duplicate login', async () => {
      await seedUser(repo, { login: 'newuser', email: 'someone@example.com' });

      const response = await request(app).post('/api/register').send(registration);

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'LOGIN_ALREADY_USED');
    });

    it('should reject duplicate email', async () => {
      await seedUser(repo, { login: 'someone', email: 'newuser@example.com' });

      const response = await request(app).post('/api/register').send(registration);

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'EMAIL_ALREADY_USED');
    });

    it('should answer 400 when the insert hits a login taken since the check', async () => {
      const staleRepo = new StaleReadUserRepo();
      await seedUser(staleRepo, { login: 'newuser', email: 'someone@example.com' });
      const racingApp = createApp({
        userRepo: staleRepo,
        userService: new UserService(staleRepo),
        jwtSecret: JWT_SECRET,
        tokenTtlSeconds: 3600,
        healthCheck: async () => undefined,
      });

      const response = await request(racingApp).post('/api/register').send(registration);

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        code: 'LOGIN_ALREADY_USED',
        message: 'Login name already used!',
      });
      expect(staleRepo.all()).toHaveLength(1);
    });

    it('should register only one of two simultaneous requests for a login', async () => {
      const responses = await Promise.all([
        request(app).post('/api/register').send(registration),
        request(app)
          .post('/api/register')
          .send({ ...registration, email: 'other@example.com' }),
      ]);

      expect(responses.map((r) => r.status).sort()).toEqual([201, 400]);
      expect(repo.all()).toHaveLength(1);
    });
  });

  describe('POST /api/authenticate', () => {
    beforeEach(async () => {
      await seedUser(repo, { login: 'loginuser', password: 'password123' });
    });

    it('should login with valid credentials', async () => {
      const response = await request(app)
        .post('/api/authenticate')
        .send({ username: 'loginuser', password: 'password123' });

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('id_token');
      expect(response.headers.authorization).toBe(`Bearer ${response.body.id_token}`);
      expect(jwt.verify(response.body.id_token, JWT_SECRET)).toMatchObject({
        sub: 'loginuser',
        auth: ['ROLE_USER'],
      });
    });

    it('should reject unknown login', async () => {
      const response = await request(app)
        .post('/api/authenticate')
        .send({ username: 'nonexistent', password: 'password123' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Invalid username or password',
      });
    });

    it('should reject invalid password', async () => {
      const response = await request(app)
        .post('/api/authenticate')
        .send({ username: 'loginuser', password: 'wrongpassword' });

      expect(response.status).toBe(401);
      expect(response.body).toHaveProperty('code', 'UNAUTHORIZED');
    });

    it('should reject a user that is not activated', async () => {
      await seedUser(repo, { login: 'sleeper', activated: false });

      const response = await request(app)
        .post('/api/authenticate')
        .send({ username: 'sleeper', password: 'password123' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'USER_NOT_ACTIVATED',
        message: 'User sleeper was not activated',
      });
    });

    it('should reject a missing password', async () => {
      const response = await request(app)
        .post('/api/authenticate')
        .send({ username: 'loginuser' });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
    });

    it('should enforce rate limit on login', async () => {
      const statuses: number[] = [];
      for (let i = 0; i < 11; i++) {
        const response = await request(app)
          .post('/api/authenticate')
          .send({ username: 'nonexistent', password: 'wrongpassword' });
        statuses.push(response.status);
      }

      expect(statuses.slice(0, 10)).toEqual(Array(10).fill(401));
      expect(statuses[10]).toBe(429);
    });
  });

  describe('Registration flow', () => {
    it('should register, activate, login and read the account', async () => {
      const registered = await request(app).post('/api/register').send(registration);
      expect(registered.status).toBe(201);

      const beforeActivation = await request(app)
        .post('/api/authenticate')
        .send({ username: 'newuser', password: 'password123' });
      expect(beforeActivation.status).toBe(401);

      const pending = await repo.findOneByLogin('newuser');
      const activated = await request(app)
        .get('/api/activate')
        .query({ key: pending?.activationKey ?? '' });
      expect(activated.status).toBe(200);

      const login = await request(app)
        .post('/api/authenticate')
        .send({ username: 'newuser', password: 'password123' });
      expect(login.status).toBe(200);

      const account = await request(app)
        .get('/api/account')
        .set('Authorization', `Bearer ${login.body.id_token}`);
      expect(account.status).toBe(200);
      expect(account.body).toMatchObject({ login: 'newuser', activated: true });

      const whoami = await request(app)
        .get('/api/authenticate')
        .set('Authorization', `Bearer ${login.body.id_token}`);
      expect(whoami.text).toBe('newuser');
    });
  });
});
